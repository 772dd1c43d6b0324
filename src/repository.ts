/**
 * Provider Repositories
 * Where provider manifests are read from, and how a manifest file is picked.
 */

import { readFile } from "fs/promises";
import path from "path";
import { Components, ProviderIdentity, buildComponents } from "./components";
import { NotFoundError } from "./errors";
import { VariablesSource } from "./variables";

export const DEFAULT_VERSION = "latest";

// ============================================================================
// Repositories
// ============================================================================

export interface ProviderRepository {
  defaultVersion(): string;
  /** Resolves to undefined when the file does not exist. */
  getFile(version: string, fileName: string): Promise<string | undefined>;
}

export interface FileSystemRepositoryOptions {
  rootPath: string;
  defaultVersion?: string;
}

/**
 * Manifests laid out on disk as `<rootPath>/<version>/<fileName>`.
 */
export class FileSystemRepository implements ProviderRepository {
  private readonly rootPath: string;
  private readonly version: string;

  constructor(options: FileSystemRepositoryOptions) {
    this.rootPath = options.rootPath;
    this.version = options.defaultVersion ?? DEFAULT_VERSION;
  }

  defaultVersion(): string {
    return this.version;
  }

  async getFile(version: string, fileName: string): Promise<string | undefined> {
    const filePath = path.join(this.rootPath, version, fileName);
    try {
      return await readFile(filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }
  }
}

// ============================================================================
// Components Client
// ============================================================================

/**
 * Manifest file naming convention:
 * - `components.yaml`, or `components-<flavor>.yaml`
 * - with a bootstrap provider, `config-<bootstrap>.yaml` or
 *   `config-<flavor>-<bootstrap>.yaml`
 */
export function componentsFileName(flavor = "", bootstrap = ""): string {
  if (bootstrap !== "") {
    return flavor !== ""
      ? `config-${flavor}-${bootstrap}.yaml`
      : `config-${bootstrap}.yaml`;
  }
  return flavor !== "" ? `components-${flavor}.yaml` : "components.yaml";
}

export interface ComponentsClientOptions {
  provider: ProviderIdentity;
  repository: ProviderRepository;
  variables: VariablesSource;
  /** Defaults to the repository's default version */
  version?: string;
}

export interface GetComponentsOptions {
  flavor?: string;
  bootstrap?: string;
  targetNamespace?: string;
  watchingNamespace?: string;
}

export class ComponentsClient {
  private readonly provider: ProviderIdentity;
  private readonly repository: ProviderRepository;
  private readonly variables: VariablesSource;
  private readonly version?: string;

  constructor(options: ComponentsClientOptions) {
    this.provider = options.provider;
    this.repository = options.repository;
    this.variables = options.variables;
    this.version = options.version;
  }

  async get(options: GetComponentsOptions = {}): Promise<Components> {
    const version = this.version || this.repository.defaultVersion();
    const fileName = componentsFileName(options.flavor, options.bootstrap);

    const rawYaml = await this.repository.getFile(version, fileName);
    if (rawYaml === undefined) {
      throw new NotFoundError(
        `failed to read "${fileName}" from the repository for provider "${this.provider.name}" version "${version}"`,
        { provider: this.provider.name, version, file: fileName },
      );
    }

    return buildComponents({
      provider: this.provider,
      version,
      rawYaml,
      variables: this.variables,
      targetNamespace: options.targetNamespace,
      watchingNamespace: options.watchingNamespace,
    });
  }
}
