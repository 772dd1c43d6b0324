/**
 * Inventory Client
 * Reads and writes the provider inventory kept in the management cluster.
 */

import { LoggerService } from "@backstage/backend-plugin-api";
import { BACKGROUND, OperationContext } from "./context";
import {
  InventoryResolver,
  filterProviders,
  fromProviderResource,
  toProviderResource,
  validateProviderInstance,
} from "./inventory";
import {
  ProviderFilter,
  ProviderRecord,
  ProviderResource,
  ProviderType,
  providerKey,
} from "./types";

/**
 * Storage of the inventory objects. `update` must reject with
 * InventoryConflictError when the object's resourceVersion is stale.
 */
export interface InventoryStore {
  list(ctx: OperationContext): Promise<ProviderResource[]>;
  get(
    namespace: string,
    name: string,
    ctx: OperationContext,
  ): Promise<ProviderResource | undefined>;
  create(resource: ProviderResource, ctx: OperationContext): Promise<void>;
  update(resource: ProviderResource, ctx: OperationContext): Promise<void>;
}

export interface InventoryClientOptions {
  store: InventoryStore;
  logger: LoggerService;
}

export class InventoryClient {
  private readonly store: InventoryStore;
  private readonly logger: LoggerService;

  constructor(options: InventoryClientOptions) {
    this.store = options.store;
    this.logger = options.logger;
  }

  // ============================================================================
  // Queries
  // ============================================================================

  async list(
    filter: ProviderFilter = {},
    ctx: OperationContext = BACKGROUND,
  ): Promise<ProviderRecord[]> {
    const resources = await this.store.list(ctx);
    return filterProviders(resources.map(fromProviderResource), filter);
  }

  async resolver(ctx: OperationContext = BACKGROUND): Promise<InventoryResolver> {
    return new InventoryResolver(await this.list({}, ctx));
  }

  async getDefaultProviderName(
    type: ProviderType,
    ctx: OperationContext = BACKGROUND,
  ): Promise<string | undefined> {
    return (await this.resolver(ctx)).defaultName(type);
  }

  async getDefaultProviderVersion(
    name: string,
    ctx: OperationContext = BACKGROUND,
  ): Promise<string | undefined> {
    return (await this.resolver(ctx)).defaultVersion(name);
  }

  async getDefaultProviderNamespace(
    name: string,
    ctx: OperationContext = BACKGROUND,
  ): Promise<string | undefined> {
    return (await this.resolver(ctx)).defaultNamespace(name);
  }

  // ============================================================================
  // Mutations
  // ============================================================================

  /**
   * Check a new instance against a fresh snapshot of the inventory.
   */
  async validate(
    candidate: ProviderRecord,
    ctx: OperationContext = BACKGROUND,
  ): Promise<void> {
    const existing = await this.list({ name: candidate.name }, ctx);
    validateProviderInstance(candidate, existing);
  }

  /**
   * Record an installed instance. An existing record for the same
   * (namespace, name) is updated in place with its current resourceVersion;
   * a concurrent change fails with InventoryConflictError.
   */
  async create(
    record: ProviderRecord,
    ctx: OperationContext = BACKGROUND,
  ): Promise<void> {
    const current = await this.store.get(record.namespace, record.name, ctx);

    if (!current) {
      this.logger.debug(`[InventoryClient] Creating ${providerKey(record)}`);
      await this.store.create(toProviderResource(record), ctx);
      return;
    }

    this.logger.debug(
      `[InventoryClient] Updating ${providerKey(record)} at resourceVersion ${current.metadata.resourceVersion}`,
    );
    await this.store.update(
      toProviderResource(record, current.metadata.resourceVersion),
      ctx,
    );
  }
}
