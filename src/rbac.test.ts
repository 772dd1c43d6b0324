import { ParseError } from "./errors";
import { ManifestDocument, parseDocuments } from "./manifest";
import { fixRBAC, prefixedName } from "./rbac";

const RBAC_MANIFEST = `
kind: ClusterRole
metadata:
  name: manager-role
---
kind: ClusterRole
metadata:
  name: proxy-role
---
kind: ClusterRoleBinding
metadata:
  name: manager-rolebinding
roleRef:
  apiGroup: rbac.authorization.k8s.io
  kind: ClusterRole
  name: manager-role
subjects:
  - kind: ServiceAccount
    name: default
    namespace: capi-system
  - kind: User
    name: admin
---
kind: RoleBinding
metadata:
  name: leader-election-rolebinding
  namespace: capi-system
roleRef:
  kind: Role
  name: proxy-role
subjects:
  - kind: ServiceAccount
    name: default
    namespace: capi-system
---
kind: RoleBinding
metadata:
  name: proxy-rolebinding
  namespace: capi-system
roleRef:
  kind: ClusterRole
  name: proxy-role
subjects: []
---
kind: ClusterRoleBinding
metadata:
  name: external-binding
roleRef:
  kind: ClusterRole
  name: cluster-admin
subjects: []
`;

const byName = (docs: ManifestDocument[], kind: string, name: string) => {
  const doc = docs.find((d) => d.kind === kind && d.name === name);
  if (!doc) {
    throw new Error(`${kind} ${name} not found`);
  }
  return doc;
};

// ============================================================================
// prefixedName Tests
// ============================================================================

describe("prefixedName", () => {
  it("should prefix the name with the namespace", () => {
    expect(prefixedName("team-a", "manager-role")).toBe("team-a-manager-role");
  });
});

// ============================================================================
// fixRBAC Tests
// ============================================================================

describe("fixRBAC", () => {
  it("should prefix ClusterRoles with the target namespace", () => {
    const fixed = fixRBAC(parseDocuments(RBAC_MANIFEST), "team-a");
    expect(
      fixed.filter((doc) => doc.kind === "ClusterRole").map((doc) => doc.name),
    ).toEqual(["team-a-manager-role", "team-a-proxy-role"]);
  });

  it("should rename ClusterRoleBindings and follow renamed ClusterRoles", () => {
    const fixed = fixRBAC(parseDocuments(RBAC_MANIFEST), "team-a");
    const binding = byName(
      fixed,
      "ClusterRoleBinding",
      "team-a-manager-rolebinding",
    );

    expect(binding.roleRef).toEqual({
      apiGroup: "rbac.authorization.k8s.io",
      kind: "ClusterRole",
      name: "team-a-manager-role",
    });
    expect(binding.subjects).toEqual([
      { kind: "ServiceAccount", name: "default", namespace: "team-a" },
      { kind: "User", name: "admin" },
    ]);
  });

  it("should keep references to ClusterRoles the manifest does not define", () => {
    const fixed = fixRBAC(parseDocuments(RBAC_MANIFEST), "team-a");
    const binding = byName(fixed, "ClusterRoleBinding", "team-a-external-binding");
    expect(binding.roleRef?.name).toBe("cluster-admin");
  });

  it("should only rename RoleBinding references to ClusterRoles", () => {
    const fixed = fixRBAC(parseDocuments(RBAC_MANIFEST), "team-a");

    const toRole = byName(fixed, "RoleBinding", "leader-election-rolebinding");
    expect(toRole.roleRef?.name).toBe("proxy-role");
    expect(toRole.subjects[0].namespace).toBe("team-a");

    const toClusterRole = byName(fixed, "RoleBinding", "proxy-rolebinding");
    expect(toClusterRole.roleRef?.name).toBe("team-a-proxy-role");
  });

  it("should produce distinct names for different target namespaces", () => {
    const docs = parseDocuments(RBAC_MANIFEST);
    const a = fixRBAC(docs, "ns-a").filter((d) => d.kind === "ClusterRole");
    const b = fixRBAC(docs, "ns-b").filter((d) => d.kind === "ClusterRole");
    const names = new Set([...a, ...b].map((doc) => doc.name));
    expect(names.size).toBe(4);
  });

  it("should not mutate its input", () => {
    const docs = parseDocuments(RBAC_MANIFEST);
    fixRBAC(docs, "team-a");
    expect(docs[0].name).toBe("manager-role");
    expect(docs[2].roleRef?.name).toBe("manager-role");
  });

  it("should throw ParseError for a binding without roleRef name", () => {
    const docs = parseDocuments(
      "kind: ClusterRoleBinding\nmetadata:\n  name: broken\nroleRef:\n  kind: ClusterRole\n",
    );
    expect(() => fixRBAC(docs, "team-a")).toThrow(ParseError);
  });

  it("should throw ParseError for a ClusterRole without a name", () => {
    const docs = parseDocuments("kind: ClusterRole\nrules: []\n");
    expect(() => fixRBAC(docs, "team-a")).toThrow(
      "Invalid manifest. ClusterRole without a name",
    );
  });
});
