import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { NotFoundError } from "./errors";
import {
  ComponentsClient,
  FileSystemRepository,
  ProviderRepository,
  componentsFileName,
} from "./repository";
import { StaticVariablesSource } from "./variables";

// ============================================================================
// In-memory Repository
// ============================================================================

class MemoryRepository implements ProviderRepository {
  readonly requests: string[] = [];

  constructor(
    private readonly files: Record<string, string>,
    private readonly version = "v1.0.0",
  ) {}

  defaultVersion(): string {
    return this.version;
  }

  async getFile(version: string, fileName: string): Promise<string | undefined> {
    const key = `${version}/${fileName}`;
    this.requests.push(key);
    return this.files[key];
  }
}

// ============================================================================
// componentsFileName Tests
// ============================================================================

describe("componentsFileName", () => {
  it("should name the default components file", () => {
    expect(componentsFileName()).toBe("components.yaml");
  });

  it("should include the flavor", () => {
    expect(componentsFileName("ipv6")).toBe("components-ipv6.yaml");
  });

  it("should name the config file of a bootstrap provider", () => {
    expect(componentsFileName("", "kubeadm")).toBe("config-kubeadm.yaml");
    expect(componentsFileName("ipv6", "kubeadm")).toBe(
      "config-ipv6-kubeadm.yaml",
    );
  });
});

// ============================================================================
// FileSystemRepository Tests
// ============================================================================

describe("FileSystemRepository", () => {
  let rootPath: string;

  beforeEach(async () => {
    rootPath = await mkdtemp(path.join(os.tmpdir(), "provider-repo-"));
    await mkdir(path.join(rootPath, "v1.0.0"));
    await writeFile(
      path.join(rootPath, "v1.0.0", "components.yaml"),
      "kind: ConfigMap\n",
    );
  });

  afterEach(async () => {
    await rm(rootPath, { recursive: true, force: true });
  });

  it("should read files by version and name", async () => {
    const repository = new FileSystemRepository({ rootPath });
    expect(await repository.getFile("v1.0.0", "components.yaml")).toBe(
      "kind: ConfigMap\n",
    );
  });

  it("should return undefined for missing files", async () => {
    const repository = new FileSystemRepository({ rootPath });
    expect(await repository.getFile("v1.0.0", "components-ipv6.yaml")).toBeUndefined();
    expect(await repository.getFile("v9.9.9", "components.yaml")).toBeUndefined();
  });

  it("should default the version to latest", () => {
    expect(new FileSystemRepository({ rootPath }).defaultVersion()).toBe("latest");
    expect(
      new FileSystemRepository({ rootPath, defaultVersion: "v1.0.0" }).defaultVersion(),
    ).toBe("v1.0.0");
  });
});

// ============================================================================
// ComponentsClient Tests
// ============================================================================

describe("ComponentsClient", () => {
  const provider = { name: "kubeadm", type: "BootstrapProvider" as const };
  const manifest = "kind: Namespace\nmetadata:\n  name: ${NAMESPACE}\n";

  it("should read the file for the default version", async () => {
    const repository = new MemoryRepository({ "v1.0.0/components.yaml": manifest });
    const client = new ComponentsClient({
      provider,
      repository,
      variables: new StaticVariablesSource({ NAMESPACE: "capi-kubeadm-system" }),
    });

    const components = await client.get();

    expect(repository.requests).toEqual(["v1.0.0/components.yaml"]);
    expect(components.version()).toBe("v1.0.0");
    expect(components.targetNamespace()).toBe("capi-kubeadm-system");
  });

  it("should prefer an explicit version and pass the options through", async () => {
    const repository = new MemoryRepository({
      "v2.0.0/config-ipv6-kubeadm.yaml": manifest,
    });
    const client = new ComponentsClient({
      provider,
      repository,
      variables: new StaticVariablesSource({ NAMESPACE: "ignored" }),
      version: "v2.0.0",
    });

    const components = await client.get({
      flavor: "ipv6",
      bootstrap: "kubeadm",
      targetNamespace: "team-a",
      watchingNamespace: "team-a",
    });

    expect(components.version()).toBe("v2.0.0");
    expect(components.targetNamespace()).toBe("team-a");
    expect(components.watchingNamespace()).toBe("team-a");
  });

  it("should throw NotFoundError for a missing file", async () => {
    const client = new ComponentsClient({
      provider,
      repository: new MemoryRepository({}),
      variables: new StaticVariablesSource(),
    });

    await expect(client.get({ flavor: "ipv6" })).rejects.toThrow(NotFoundError);
    await expect(client.get({ flavor: "ipv6" })).rejects.toThrow(
      'failed to read "components-ipv6.yaml" from the repository for provider "kubeadm" version "v1.0.0"',
    );
  });
});
