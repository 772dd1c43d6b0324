/**
 * Target Namespace Handling
 * Makes sure every namespaced object of a provider lands in one namespace.
 */

import type { JsonObject } from "@backstage/types";
import { AmbiguousNamespaceError } from "./errors";
import { ManifestDocument, cloneDocuments } from "./manifest";

export const NAMESPACE_KIND = "Namespace";

/**
 * Kinds that live at cluster scope and must never carry a namespace.
 */
export const CLUSTER_SCOPED_KINDS: ReadonlySet<string> = new Set([
  NAMESPACE_KIND,
  "ClusterRole",
  "ClusterRoleBinding",
  "CustomResourceDefinition",
  "MutatingWebhookConfiguration",
  "ValidatingWebhookConfiguration",
  "APIService",
  "PersistentVolume",
  "StorageClass",
  "PriorityClass",
  "PodSecurityPolicy",
  "IngressClass",
  "RuntimeClass",
  "CSIDriver",
  "VolumeAttachment",
  "CertificateSigningRequest",
  "Node",
]);

export function isClusterScopedKind(kind: string): boolean {
  return CLUSTER_SCOPED_KINDS.has(kind);
}

/**
 * Name of the Namespace object defined by the manifest, or "" when there is
 * none.
 */
export function inspectTargetNamespace(
  docs: ReadonlyArray<ManifestDocument>,
): string {
  const namespaces = docs
    .filter((doc) => doc.kind === NAMESPACE_KIND)
    .map((doc) => doc.name);

  if (namespaces.length > 1) {
    throw new AmbiguousNamespaceError(namespaces);
  }
  return namespaces[0] ?? "";
}

export function fixTargetNamespace(
  docs: ReadonlyArray<ManifestDocument>,
  targetNamespace: string,
): ManifestDocument[] {
  const result = cloneDocuments(docs);

  for (const doc of result) {
    if (doc.kind === NAMESPACE_KIND) {
      doc.name = targetNamespace;
      continue;
    }
    if (isClusterScopedKind(doc.kind)) {
      doc.namespace = undefined;
      continue;
    }
    doc.namespace = targetNamespace;
  }

  return result;
}

/**
 * Prepend a Namespace object for the target namespace when the manifest has
 * none, then move every object into it.
 */
export function addNamespaceIfMissing(
  docs: ReadonlyArray<ManifestDocument>,
  targetNamespace: string,
): ManifestDocument[] {
  if (docs.some((doc) => doc.kind === NAMESPACE_KIND)) {
    return fixTargetNamespace(docs, targetNamespace);
  }

  const namespace: JsonObject = {
    apiVersion: "v1",
    kind: NAMESPACE_KIND,
    metadata: {
      name: targetNamespace,
    },
  };
  return fixTargetNamespace(
    [new ManifestDocument(namespace), ...docs],
    targetNamespace,
  );
}
