/**
 * Backstage Kubernetes Backend Module for Cluster API Provider Installation
 *
 * Installs Cluster API providers (core, bootstrap, control plane and
 * infrastructure) into a management cluster from their component manifests,
 * and keeps the provider inventory of that cluster up to date.
 *
 * ## Component Pipeline
 *
 * - **Variables**: `${ NAME }` placeholders are substituted from the
 *   environment and the installer configuration
 * - **Target namespace**: every namespaced object is moved into one namespace
 * - **RBAC**: ClusterRoles and ClusterRoleBindings are prefixed with the
 *   target namespace so that several instances can coexist
 * - **Watching namespace**: controllers are told which namespace to reconcile
 * - **Labels**: every object is labelled with its owning provider
 *
 * ## Usage
 *
 * ```typescript
 * import { createBackend } from '@backstage/backend-defaults';
 *
 * const backend = createBackend();
 * backend.add(import('@backstage/plugin-kubernetes-backend'));
 * backend.add(import('kubernetes-backend-module-provider-installer'));
 * backend.start();
 * ```
 *
 * @packageDocumentation
 */

// Main module export
export { kubernetesModuleProviderInstaller, default } from "./module";

// Installer for advanced usage
export { ProviderInstaller, readInstallerConfig } from "./installer";
export type {
  InstallRequest,
  ProviderInstallerFactoryOptions,
  ProviderInstallerOptions,
} from "./installer";

// Component pipeline
export { Components, buildComponents } from "./components";
export type { ComponentsInput, ProviderIdentity } from "./components";
export {
  ManifestDocument,
  cloneDocuments,
  parseDocuments,
  serializeDocuments,
} from "./manifest";
export type { ContainerList } from "./manifest";
export {
  ConfigVariablesSource,
  StaticVariablesSource,
  inspectVariables,
  readConfigVariables,
  replaceVariables,
} from "./variables";
export type { VariablesSource } from "./variables";
export {
  CLUSTER_SCOPED_KINDS,
  addNamespaceIfMissing,
  fixTargetNamespace,
  inspectTargetNamespace,
  isClusterScopedKind,
} from "./namespaces";
export { fixRBAC, prefixedName } from "./rbac";
export {
  CONTROLLER_CONTAINER_NAME,
  NAMESPACE_ARG_PREFIX,
  fixWatchNamespace,
  inspectWatchNamespace,
} from "./watchNamespace";
export { inspectImages } from "./images";
export { addLabels, providerLabels } from "./labels";

// Repositories
export {
  ComponentsClient,
  DEFAULT_VERSION,
  FileSystemRepository,
  componentsFileName,
} from "./repository";
export type {
  ComponentsClientOptions,
  FileSystemRepositoryOptions,
  GetComponentsOptions,
  ProviderRepository,
} from "./repository";

// Inventory
export {
  InventoryResolver,
  filterProviders,
  fromProviderResource,
  parseProviderResource,
  scopesOverlap,
  toProviderResource,
  validateProviderInstance,
} from "./inventory";
export { InventoryClient } from "./InventoryClient";
export type { InventoryClientOptions, InventoryStore } from "./InventoryClient";

// Management cluster client
export {
  ClusterClient,
  createClusterClient,
  toKubernetesObject,
} from "./ClusterClient";
export type { ClusterClientOptions, ComponentsApplier } from "./ClusterClient";

// Cancellation
export { BACKGROUND, checkContext, runWithContext } from "./context";
export type { OperationContext } from "./context";

// Errors
export * from "./errors";

// Type exports
export type {
  KubeMetadata,
  ProviderType,
  ProviderRecord,
  ProviderResource,
  ProviderFilter,
  ClusterConnectionConfig,
  ProviderInstallConfig,
  ProviderInstallerConfig,
} from "./types";

// Utility exports
export {
  INVENTORY_API_GROUP,
  INVENTORY_API_VERSION,
  INVENTORY_KIND,
  INVENTORY_PLURAL,
  LABEL_INSTALLER,
  LABEL_INSTALLER_CORE,
  LABEL_PROVIDER,
  PROVIDER_TYPES,
  isProviderType,
  parseProviderType,
  providerKey,
} from "./types";
