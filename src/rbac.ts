/**
 * RBAC Rewriting
 *
 * ClusterRoles and ClusterRoleBindings are cluster-wide, so two instances of
 * the same provider installed in different namespaces would overwrite each
 * other's objects. They get prefixed with the target namespace, and every
 * reference to a renamed ClusterRole inside the manifest follows the rename.
 */

import { ParseError } from "./errors";
import { ManifestDocument, cloneDocuments } from "./manifest";

export const CLUSTER_ROLE_KIND = "ClusterRole";
export const CLUSTER_ROLE_BINDING_KIND = "ClusterRoleBinding";
export const ROLE_BINDING_KIND = "RoleBinding";
export const SERVICE_ACCOUNT_KIND = "ServiceAccount";

export function prefixedName(targetNamespace: string, name: string): string {
  return `${targetNamespace}-${name}`;
}

function requireName(doc: ManifestDocument): string {
  if (!doc.name) {
    throw new ParseError(`Invalid manifest. ${doc.kind} without a name`, {
      kind: doc.kind,
    });
  }
  return doc.name;
}

function fixBinding(
  doc: ManifestDocument,
  targetNamespace: string,
  renamedClusterRoles: Map<string, string>,
): void {
  const roleRef = doc.roleRef;
  const roleName = roleRef?.name;
  if (!roleRef || typeof roleName !== "string") {
    throw new ParseError(
      `Invalid manifest. ${doc.describe()} has no roleRef name`,
      { kind: doc.kind, name: doc.name },
    );
  }

  // A RoleBinding may reference either a Role or a ClusterRole; only the
  // latter is renamed.
  const referencesClusterRole =
    doc.kind === CLUSTER_ROLE_BINDING_KIND || roleRef.kind === CLUSTER_ROLE_KIND;
  const renamed = renamedClusterRoles.get(roleName);
  if (referencesClusterRole && renamed !== undefined) {
    roleRef.name = renamed;
  }

  for (const subject of doc.subjects) {
    if (subject.kind === SERVICE_ACCOUNT_KIND) {
      subject.namespace = targetNamespace;
    }
  }
}

export function fixRBAC(
  docs: ReadonlyArray<ManifestDocument>,
  targetNamespace: string,
): ManifestDocument[] {
  const result = cloneDocuments(docs);

  // Original name -> prefixed name, for ClusterRoles defined in this manifest
  const renamedClusterRoles = new Map<string, string>();
  for (const doc of result) {
    if (doc.kind !== CLUSTER_ROLE_KIND) {
      continue;
    }
    const name = requireName(doc);
    const newName = prefixedName(targetNamespace, name);
    renamedClusterRoles.set(name, newName);
    doc.name = newName;
  }

  for (const doc of result) {
    switch (doc.kind) {
      case CLUSTER_ROLE_BINDING_KIND:
        doc.name = prefixedName(targetNamespace, requireName(doc));
        fixBinding(doc, targetNamespace, renamedClusterRoles);
        break;
      case ROLE_BINDING_KIND:
        fixBinding(doc, targetNamespace, renamedClusterRoles);
        break;
      default:
        break;
    }
  }

  return result;
}
