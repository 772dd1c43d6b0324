/**
 * Provider Inventory Types
 * Based on clusterctl.cluster.x-k8s.io/v1alpha3
 */

// ============================================================================
// Kubernetes Common Types
// ============================================================================

export interface KubeMetadata {
  name?: string;
  namespace?: string;
  uid?: string;
  resourceVersion?: string;
  annotations?: Record<string, string>;
  labels?: Record<string, string>;
}

// ============================================================================
// Inventory Constants
// ============================================================================

export const INVENTORY_API_GROUP = "clusterctl.cluster.x-k8s.io";
export const INVENTORY_API_VERSION = "v1alpha3";
export const INVENTORY_PLURAL = "providers";
export const INVENTORY_KIND = "Provider";

/** Marks every object installed by the installer; the value is always empty. */
export const LABEL_INSTALLER = "clusterctl.cluster.x-k8s.io";
/** Names the provider that owns an object. */
export const LABEL_PROVIDER = "cluster.x-k8s.io/provider";
/** Marks the inventory objects themselves. */
export const LABEL_INSTALLER_CORE = "clusterctl.cluster.x-k8s.io/core";

// ============================================================================
// Provider Types
// ============================================================================

export const PROVIDER_TYPES = [
  "CoreProvider",
  "BootstrapProvider",
  "ControlPlaneProvider",
  "InfrastructureProvider",
] as const;

export type ProviderType = (typeof PROVIDER_TYPES)[number];

/**
 * One installed provider instance.
 *
 * An empty `watchedNamespace` means the instance reconciles objects in all
 * namespaces.
 */
export interface ProviderRecord {
  name: string;
  namespace: string;
  type: ProviderType;
  version: string;
  watchedNamespace: string;
}

/** Provider inventory object as stored in the cluster. */
export interface ProviderResource {
  apiVersion: string;
  kind: string;
  metadata: KubeMetadata;
  type?: string;
  version?: string;
  watchedNamespace?: string;
}

export interface ProviderFilter {
  name?: string;
  namespace?: string;
  type?: ProviderType;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface ClusterConnectionConfig {
  name: string;
  url: string;
  token?: string;
  caData?: string;
  skipTLSVerify?: boolean;
}

export interface ProviderInstallConfig {
  name: string;
  type: ProviderType;
  /** Root directory of the provider's local manifest repository */
  path: string;
  version?: string;
  targetNamespace?: string;
  watchingNamespace?: string;
  flavor?: string;
  bootstrap?: string;
}

export interface ProviderInstallerConfig {
  cluster?: ClusterConnectionConfig;
  variables: Record<string, string>;
  providers: ProviderInstallConfig[];
}

// ============================================================================
// Utility Functions
// ============================================================================

export function isProviderType(value: unknown): value is ProviderType {
  return PROVIDER_TYPES.some((type) => type === value);
}

/**
 * Accepts both the full type name and its short form
 * (e.g. "InfrastructureProvider" and "infrastructure").
 */
export function parseProviderType(value: string): ProviderType | undefined {
  if (isProviderType(value)) {
    return value;
  }
  const normalized = value.toLowerCase().replace(/[-_\s]/g, "");
  return PROVIDER_TYPES.find(
    (type) =>
      type.toLowerCase() === normalized ||
      type.toLowerCase().replace(/provider$/, "") === normalized,
  );
}

export function providerKey(record: { name: string; namespace: string }): string {
  return `${record.namespace}/${record.name}`;
}
