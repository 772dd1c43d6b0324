/**
 * Provider Installer Error Taxonomy
 *
 * None of these errors is retried by the installer. Each carries the provider,
 * namespace or document it refers to, so that the message can be shown to the
 * user as is.
 */

export enum ErrorCode {
  // Manifest authoring
  PARSE_ERROR = "PARSE_ERROR",
  MISSING_VARIABLES = "MISSING_VARIABLES",
  AMBIGUOUS_NAMESPACE = "AMBIGUOUS_NAMESPACE",
  MISSING_TARGET_NAMESPACE = "MISSING_TARGET_NAMESPACE",
  INCONSISTENT_WATCH_SCOPE = "INCONSISTENT_WATCH_SCOPE",

  // Inventory rules
  DUPLICATE_INSTALL = "DUPLICATE_INSTALL",
  CONFLICTING_SCOPE = "CONFLICTING_SCOPE",
  INVENTORY_CONFLICT = "INVENTORY_CONFLICT",

  // Lookup and lifecycle
  NOT_FOUND = "NOT_FOUND",
  OPERATION_CANCELLED = "OPERATION_CANCELLED",
}

export type ErrorContext = Record<string, string | string[] | undefined>;

export class ProviderInstallerError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context: ErrorContext = {},
  ) {
    super(message);
    this.name = "ProviderInstallerError";
  }
}

export class ParseError extends ProviderInstallerError {
  constructor(message: string, context: ErrorContext = {}) {
    super(ErrorCode.PARSE_ERROR, message, context);
    this.name = "ParseError";
  }
}

export class MissingVariablesError extends ProviderInstallerError {
  constructor(public readonly variables: string[]) {
    super(
      ErrorCode.MISSING_VARIABLES,
      `value for variables [${variables.join(", ")}] is not set. Please set the value using os environment variables or the installer configuration`,
      { variables },
    );
    this.name = "MissingVariablesError";
  }
}

export class AmbiguousNamespaceError extends ProviderInstallerError {
  constructor(namespaces: string[]) {
    super(
      ErrorCode.AMBIGUOUS_NAMESPACE,
      `Invalid manifest. There should be no more than one resource with Kind Namespace in the provider components yaml, found [${namespaces.join(", ")}]`,
      { namespaces },
    );
    this.name = "AmbiguousNamespaceError";
  }
}

export class MissingTargetNamespaceError extends ProviderInstallerError {
  constructor(provider: string) {
    super(
      ErrorCode.MISSING_TARGET_NAMESPACE,
      `target namespace for the "${provider}" provider can't be defaulted. Please specify a target namespace`,
      { provider },
    );
    this.name = "MissingTargetNamespaceError";
  }
}

export class InconsistentWatchScopeError extends ProviderInstallerError {
  constructor(found: string, conflicting: string) {
    super(
      ErrorCode.INCONSISTENT_WATCH_SCOPE,
      `Invalid manifest. All the controllers should watch the same namespace, found "${found}" and "${conflicting}"`,
      { namespaces: [found, conflicting] },
    );
    this.name = "InconsistentWatchScopeError";
  }
}

export class DuplicateInstallError extends ProviderInstallerError {
  constructor(provider: string, namespace: string) {
    super(
      ErrorCode.DUPLICATE_INSTALL,
      `There is already an instance of the "${provider}" provider installed in the "${namespace}" namespace`,
      { provider, namespace },
    );
    this.name = "DuplicateInstallError";
  }
}

export class ConflictingScopeError extends ProviderInstallerError {
  constructor(provider: string, watchedNamespace: string, conflictsWith: string) {
    super(
      ErrorCode.CONFLICTING_SCOPE,
      watchedNamespace === ""
        ? `The new instance of the "${provider}" provider is going to watch for objects in namespaces already controlled by other providers (conflicts with ${conflictsWith})`
        : `The new instance of the "${provider}" provider is going to watch for objects in the namespace "${watchedNamespace}" that is already controlled by other providers (conflicts with ${conflictsWith})`,
      { provider, watchedNamespace, conflictsWith },
    );
    this.name = "ConflictingScopeError";
  }
}

export class InventoryConflictError extends ProviderInstallerError {
  constructor(provider: string, namespace: string) {
    super(
      ErrorCode.INVENTORY_CONFLICT,
      `The inventory record of the "${provider}" provider in the "${namespace}" namespace was changed by someone else; fetch it again and retry`,
      { provider, namespace },
    );
    this.name = "InventoryConflictError";
  }
}

export class NotFoundError extends ProviderInstallerError {
  constructor(message: string, context: ErrorContext = {}) {
    super(ErrorCode.NOT_FOUND, message, context);
    this.name = "NotFoundError";
  }
}

export class OperationCancelledError extends ProviderInstallerError {
  constructor(reason: string) {
    super(ErrorCode.OPERATION_CANCELLED, `operation cancelled: ${reason}`);
    this.name = "OperationCancelledError";
  }
}

export function isProviderInstallerError(
  value: unknown,
): value is ProviderInstallerError {
  return value instanceof ProviderInstallerError;
}
