/**
 * Watching Namespace
 *
 * Provider controllers take the namespace they reconcile as a
 * `--namespace=<value>` argument of their `manager` container; without it
 * they watch all namespaces.
 */

import { InconsistentWatchScopeError } from "./errors";
import { ManifestDocument, cloneDocuments } from "./manifest";
import type { JsonObject } from "@backstage/types";

export const DEPLOYMENT_KIND = "Deployment";
export const CONTROLLER_CONTAINER_NAME = "manager";
export const NAMESPACE_ARG_PREFIX = "--namespace=";

function controllerContainers(
  docs: ReadonlyArray<ManifestDocument>,
): JsonObject[] {
  return docs
    .filter((doc) => doc.kind === DEPLOYMENT_KIND)
    .flatMap((doc) => doc.containers())
    .filter((container) => container.name === CONTROLLER_CONTAINER_NAME);
}

function containerArgs(container: JsonObject): string[] {
  const args = container.args;
  if (!Array.isArray(args)) {
    return [];
  }
  return args.filter((arg): arg is string => typeof arg === "string");
}

/**
 * The namespace the controllers watch, or "" for all namespaces. Controllers
 * without the argument do not take part in the consistency check.
 */
export function inspectWatchNamespace(
  docs: ReadonlyArray<ManifestDocument>,
): string {
  let namespace: string | undefined;

  for (const container of controllerContainers(docs)) {
    for (const arg of containerArgs(container)) {
      if (!arg.startsWith(NAMESPACE_ARG_PREFIX)) {
        continue;
      }
      const value = arg.slice(NAMESPACE_ARG_PREFIX.length);
      if (namespace !== undefined && value !== namespace) {
        throw new InconsistentWatchScopeError(namespace, value);
      }
      namespace = value;
    }
  }

  return namespace ?? "";
}

/**
 * Set the watching namespace on every controller; an empty value removes the
 * argument so that the controllers watch all namespaces.
 */
export function fixWatchNamespace(
  docs: ReadonlyArray<ManifestDocument>,
  watchingNamespace: string,
): ManifestDocument[] {
  const result = cloneDocuments(docs);

  for (const container of controllerContainers(result)) {
    const args: string[] = [];
    let found = false;
    for (const arg of containerArgs(container)) {
      if (!arg.startsWith(NAMESPACE_ARG_PREFIX)) {
        args.push(arg);
        continue;
      }
      if (watchingNamespace !== "" && !found) {
        args.push(`${NAMESPACE_ARG_PREFIX}${watchingNamespace}`);
        found = true;
      }
    }
    if (watchingNamespace !== "" && !found) {
      args.push(`${NAMESPACE_ARG_PREFIX}${watchingNamespace}`);
    }
    if (args.length > 0 || container.args !== undefined) {
      container.args = args;
    }
  }

  return result;
}
