/**
 * Provider Inventory Rules
 *
 * Decides whether a new provider instance can live next to the instances
 * already installed, and derives defaults from the installed set. Everything
 * here works on a snapshot of the inventory fetched by the caller.
 */

import { ConflictingScopeError, DuplicateInstallError, ParseError } from "./errors";
import type { JsonObject } from "@backstage/types";
import { isJsonObject } from "./manifest";
import {
  INVENTORY_API_GROUP,
  INVENTORY_API_VERSION,
  INVENTORY_KIND,
  LABEL_INSTALLER,
  LABEL_INSTALLER_CORE,
  LABEL_PROVIDER,
  ProviderFilter,
  ProviderRecord,
  ProviderResource,
  ProviderType,
  isProviderType,
  providerKey,
} from "./types";

// ============================================================================
// Validation
// ============================================================================

/**
 * Whether two watched namespaces overlap. An empty or missing namespace
 * stands for all namespaces and overlaps with everything.
 */
export function scopesOverlap(a?: string, b?: string): boolean {
  if (!a || !b) {
    return true;
  }
  return a === b;
}

/**
 * Throws when installing `candidate` would give two instances of the same
 * provider the same namespace, or would make them reconcile the same objects.
 */
export function validateProviderInstance(
  candidate: ProviderRecord,
  existing: ReadonlyArray<ProviderRecord>,
): void {
  const instances = existing.filter((record) => record.name === candidate.name);
  if (instances.length === 0) {
    return;
  }

  const sameNamespace = instances.find(
    (record) => record.namespace === candidate.namespace,
  );
  if (sameNamespace) {
    throw new DuplicateInstallError(candidate.name, candidate.namespace);
  }

  const overlapping = instances.find((record) =>
    scopesOverlap(candidate.watchedNamespace, record.watchedNamespace),
  );
  if (overlapping) {
    throw new ConflictingScopeError(
      candidate.name,
      candidate.watchedNamespace,
      providerKey(overlapping),
    );
  }
}

// ============================================================================
// Filtering and Defaults
// ============================================================================

export function filterProviders(
  records: ReadonlyArray<ProviderRecord>,
  filter: ProviderFilter = {},
): ProviderRecord[] {
  return records.filter(
    (record) =>
      (!filter.name || record.name === filter.name) &&
      (!filter.namespace || record.namespace === filter.namespace) &&
      (!filter.type || record.type === filter.type),
  );
}

function uniqueValue(values: string[]): string | undefined {
  const distinct = new Set(values);
  return distinct.size === 1 ? values[0] : undefined;
}

/**
 * Defaults derived from an inventory snapshot. Each default exists only when
 * the matching records agree on a single value; no record and conflicting
 * records both give undefined.
 */
export class InventoryResolver {
  constructor(private readonly records: ReadonlyArray<ProviderRecord>) {}

  list(filter: ProviderFilter = {}): ProviderRecord[] {
    return filterProviders(this.records, filter);
  }

  /** The only provider name installed for a type, e.g. the single infrastructure provider. */
  defaultName(type: ProviderType): string | undefined {
    return uniqueValue(this.list({ type }).map((record) => record.name));
  }

  /** The only version installed for a provider. */
  defaultVersion(name: string): string | undefined {
    return uniqueValue(this.list({ name }).map((record) => record.version));
  }

  /** The only namespace a provider is installed in. */
  defaultNamespace(name: string): string | undefined {
    return uniqueValue(this.list({ name }).map((record) => record.namespace));
  }
}

// ============================================================================
// Conversion
// ============================================================================

export function toProviderResource(
  record: ProviderRecord,
  resourceVersion?: string,
): ProviderResource {
  return {
    apiVersion: `${INVENTORY_API_GROUP}/${INVENTORY_API_VERSION}`,
    kind: INVENTORY_KIND,
    metadata: {
      name: record.name,
      namespace: record.namespace,
      labels: {
        [LABEL_INSTALLER]: "",
        [LABEL_PROVIDER]: record.name,
        [LABEL_INSTALLER_CORE]: "inventory",
      },
      ...(resourceVersion ? { resourceVersion } : {}),
    },
    type: record.type,
    version: record.version,
    watchedNamespace: record.watchedNamespace,
  };
}

export function fromProviderResource(resource: ProviderResource): ProviderRecord {
  const { name, namespace } = resource.metadata;
  if (!name || !namespace) {
    throw new ParseError("inventory record without name or namespace", {
      name,
      namespace,
    });
  }
  if (!isProviderType(resource.type)) {
    throw new ParseError(
      `inventory record ${namespace}/${name} has an unknown provider type "${resource.type}"`,
      { provider: name, namespace },
    );
  }
  return {
    name,
    namespace,
    type: resource.type,
    version: resource.version ?? "",
    watchedNamespace: resource.watchedNamespace ?? "",
  };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Read an inventory object returned by the API server.
 */
export function parseProviderResource(value: unknown): ProviderResource {
  if (!isJsonObject(value)) {
    throw new ParseError("inventory object is not a mapping of fields");
  }
  const rawMetadata = value.metadata;
  const metadata: JsonObject = isJsonObject(rawMetadata) ? rawMetadata : {};
  const rawLabels = metadata.labels;
  const labels: Record<string, string> = {};
  if (isJsonObject(rawLabels)) {
    for (const [key, label] of Object.entries(rawLabels)) {
      if (typeof label === "string") {
        labels[key] = label;
      }
    }
  }
  return {
    apiVersion: optionalString(value.apiVersion) ?? "",
    kind: optionalString(value.kind) ?? "",
    metadata: {
      name: optionalString(metadata.name),
      namespace: optionalString(metadata.namespace),
      resourceVersion: optionalString(metadata.resourceVersion),
      labels,
    },
    type: optionalString(value.type),
    version: optionalString(value.version),
    watchedNamespace: optionalString(value.watchedNamespace),
  };
}
