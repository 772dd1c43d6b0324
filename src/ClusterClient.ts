/**
 * Management Cluster Client
 * Wrapper around @kubernetes/client-node for the provider inventory and for
 * creating provider components
 */

import {
  CustomObjectsApi,
  HttpError,
  KubeConfig,
  KubernetesObject,
  KubernetesObjectApi,
  V1ObjectMeta,
} from "@kubernetes/client-node";
import { LoggerService } from "@backstage/backend-plugin-api";
import type { JsonObject } from "@backstage/types";
import { OperationContext, runWithContext } from "./context";
import { InventoryConflictError } from "./errors";
import { InventoryStore } from "./InventoryClient";
import { isJsonObject, ManifestDocument } from "./manifest";
import { parseProviderResource } from "./inventory";
import {
  ClusterConnectionConfig,
  INVENTORY_API_GROUP,
  INVENTORY_API_VERSION,
  INVENTORY_PLURAL,
  ProviderResource,
} from "./types";

export interface ComponentsApplier {
  /** Create the objects in order; objects that already exist are left as they are. */
  apply(
    objects: ReadonlyArray<ManifestDocument>,
    ctx: OperationContext,
  ): Promise<void>;
}

export interface ClusterClientOptions {
  /** Without a cluster, the default kubeconfig loading rules apply */
  cluster?: ClusterConnectionConfig;
  logger: LoggerService;
}

export class ClusterClient implements InventoryStore, ComponentsApplier {
  private readonly customApi: CustomObjectsApi;
  private readonly objectApi: KubernetesObjectApi;
  private readonly logger: LoggerService;
  private readonly clusterName: string;

  constructor(options: ClusterClientOptions) {
    const kc = createKubeConfig(options.cluster);
    this.customApi = kc.makeApiClient(CustomObjectsApi);
    this.objectApi = KubernetesObjectApi.makeApiClient(kc);
    this.logger = options.logger;
    this.clusterName = options.cluster?.name ?? kc.getCurrentCluster()?.name ?? "default";
  }

  // ============================================================================
  // Inventory Operations
  // ============================================================================

  async list(ctx: OperationContext): Promise<ProviderResource[]> {
    try {
      const res = await runWithContext(ctx, () =>
        this.customApi.listClusterCustomObject(
          INVENTORY_API_GROUP,
          INVENTORY_API_VERSION,
          INVENTORY_PLURAL,
        ),
      );
      const body: unknown = res.body;
      const items = isJsonObject(body) ? body.items : undefined;
      return Array.isArray(items) ? items.map(parseProviderResource) : [];
    } catch (error) {
      throw this.wrapError("failed to list providers", error);
    }
  }

  async get(
    namespace: string,
    name: string,
    ctx: OperationContext,
  ): Promise<ProviderResource | undefined> {
    try {
      const res = await runWithContext(ctx, () =>
        this.customApi.getNamespacedCustomObject(
          INVENTORY_API_GROUP,
          INVENTORY_API_VERSION,
          namespace,
          INVENTORY_PLURAL,
          name,
        ),
      );
      return parseProviderResource(res.body);
    } catch (error) {
      if (statusCode(error) === 404) {
        return undefined;
      }
      throw this.wrapError(
        `failed to get current provider object ${namespace}/${name}`,
        error,
      );
    }
  }

  async create(resource: ProviderResource, ctx: OperationContext): Promise<void> {
    const { name = "", namespace = "" } = resource.metadata;
    try {
      await runWithContext(ctx, () =>
        this.customApi.createNamespacedCustomObject(
          INVENTORY_API_GROUP,
          INVENTORY_API_VERSION,
          namespace,
          INVENTORY_PLURAL,
          resource,
        ),
      );
    } catch (error) {
      throw this.wrapError(
        `failed to create provider object ${namespace}/${name}`,
        error,
      );
    }
  }

  async update(resource: ProviderResource, ctx: OperationContext): Promise<void> {
    const { name = "", namespace = "" } = resource.metadata;
    try {
      await runWithContext(ctx, () =>
        this.customApi.replaceNamespacedCustomObject(
          INVENTORY_API_GROUP,
          INVENTORY_API_VERSION,
          namespace,
          INVENTORY_PLURAL,
          name,
          resource,
        ),
      );
    } catch (error) {
      if (statusCode(error) === 409) {
        throw new InventoryConflictError(name, namespace);
      }
      throw this.wrapError(
        `failed to update provider object ${namespace}/${name}`,
        error,
      );
    }
  }

  // ============================================================================
  // Components Operations
  // ============================================================================

  async apply(
    objects: ReadonlyArray<ManifestDocument>,
    ctx: OperationContext,
  ): Promise<void> {
    for (const object of objects) {
      this.logger.debug(
        `[ClusterClient:${this.clusterName}] Creating ${object.apiVersion} ${object.describe()}`,
      );
      try {
        await runWithContext(ctx, () =>
          this.objectApi.create(toKubernetesObject(object)),
        );
      } catch (error) {
        if (statusCode(error) === 409) {
          this.logger.debug(
            `[ClusterClient:${this.clusterName}] ${object.describe()} already exists`,
          );
          continue;
        }
        throw this.wrapError(
          `failed to create provider component ${object.apiVersion} ${object.describe()}`,
          error,
        );
      }
    }
  }

  // ============================================================================
  // Utility Methods
  // ============================================================================

  private wrapError(message: string, error: unknown): Error {
    if (error instanceof InventoryConflictError) {
      return error;
    }
    const detail = describeError(error);
    this.logger.warn(`[ClusterClient:${this.clusterName}] ${message}: ${detail}`);
    return new Error(`${message}: ${detail}`, { cause: error });
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

function createKubeConfig(cluster?: ClusterConnectionConfig): KubeConfig {
  const kc = new KubeConfig();

  if (!cluster) {
    kc.loadFromDefault();
    return kc;
  }

  kc.loadFromOptions({
    clusters: [
      {
        name: cluster.name,
        server: cluster.url,
        skipTLSVerify: cluster.skipTLSVerify ?? false,
        caData: cluster.caData,
      },
    ],
    users: [
      {
        name: `${cluster.name}-user`,
        token: cluster.token,
      },
    ],
    contexts: [
      {
        name: `${cluster.name}-context`,
        user: `${cluster.name}-user`,
        cluster: cluster.name,
      },
    ],
    currentContext: `${cluster.name}-context`,
  });

  return kc;
}

function statusCode(error: unknown): number | undefined {
  return error instanceof HttpError ? error.statusCode : undefined;
}

function describeError(error: unknown): string {
  if (error instanceof HttpError) {
    const body: unknown = error.body;
    const message =
      isJsonObject(body) && typeof body.message === "string"
        ? body.message
        : error.message;
    return `${error.statusCode ?? "unknown status"} ${message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/** Metadata fields set by the API server, never sent on create. */
const SERVER_OWNED_METADATA = new Set([
  "uid",
  "resourceVersion",
  "generation",
  "creationTimestamp",
  "deletionTimestamp",
  "deletionGracePeriodSeconds",
  "managedFields",
  "selfLink",
]);

/**
 * Typed view of a manifest object for the generic object API. Server-owned
 * metadata is dropped; everything else in metadata is carried over.
 */
export function toKubernetesObject(doc: ManifestDocument): KubernetesObject {
  const object = doc.toObject();
  const settable: JsonObject = {};
  if (isJsonObject(object.metadata)) {
    for (const [key, value] of Object.entries(object.metadata)) {
      if (!SERVER_OWNED_METADATA.has(key)) {
        settable[key] = value;
      }
    }
  }

  const metadata: V1ObjectMeta = { name: doc.name };
  if (doc.namespace) {
    metadata.namespace = doc.namespace;
  }
  const labels = doc.labels;
  if (Object.keys(labels).length > 0) {
    metadata.labels = labels;
  }
  const annotations = doc.annotations;
  if (Object.keys(annotations).length > 0) {
    metadata.annotations = annotations;
  }
  return Object.assign(object, {
    apiVersion: doc.apiVersion,
    kind: doc.kind,
    metadata: Object.assign(settable, metadata),
  });
}

export function createClusterClient(
  cluster: ClusterConnectionConfig | undefined,
  logger: LoggerService,
): ClusterClient {
  return new ClusterClient({ cluster, logger });
}
