/**
 * Provider Installer
 * Installs providers into the management cluster and records them in the
 * provider inventory
 *
 * Install flow:
 * - Provider manifest → Components (variables, namespaces, RBAC, labels)
 * - Components → inventory validation against a fresh snapshot
 * - Components → created in the cluster
 * - Inventory record created or updated in place
 */

import { Duration } from "luxon";
import {
  LoggerService,
  SchedulerServiceTaskScheduleDefinition,
} from "@backstage/backend-plugin-api";
import { Config } from "@backstage/config";

import { ClusterClient, ComponentsApplier } from "./ClusterClient";
import { Components } from "./components";
import { BACKGROUND, OperationContext, checkContext } from "./context";
import { InventoryClient } from "./InventoryClient";
import {
  ComponentsClient,
  FileSystemRepository,
  ProviderRepository,
} from "./repository";
import {
  ClusterConnectionConfig,
  ProviderInstallConfig,
  ProviderInstallerConfig,
  ProviderType,
  parseProviderType,
  providerKey,
} from "./types";
import { ConfigVariablesSource, VariablesSource, readConfigVariables } from "./variables";

// ============================================================================
// Configuration Types
// ============================================================================

export interface InstallRequest {
  name: string;
  type: ProviderType;
  repository: ProviderRepository;
  version?: string;
  targetNamespace?: string;
  watchingNamespace?: string;
  flavor?: string;
  bootstrap?: string;
}

export interface ProviderInstallerFactoryOptions {
  logger: LoggerService;
}

export interface ProviderInstallerOptions {
  inventory: InventoryClient;
  applier: ComponentsApplier;
  variables: VariablesSource;
  logger: LoggerService;
  /** Installed in order by run() */
  providers?: InstallRequest[];
  schedule?: SchedulerServiceTaskScheduleDefinition;
}

// ============================================================================
// Provider Installer
// ============================================================================

export class ProviderInstaller {
  private readonly inventory: InventoryClient;
  private readonly applier: ComponentsApplier;
  private readonly variables: VariablesSource;
  private readonly logger: LoggerService;
  private readonly providers: InstallRequest[];
  private readonly schedule: SchedulerServiceTaskScheduleDefinition;

  /**
   * Create a ProviderInstaller from the `providerInstaller` config section.
   * Returns undefined when the section is absent.
   */
  static fromConfig(
    config: Config,
    options: ProviderInstallerFactoryOptions,
  ): ProviderInstaller | undefined {
    const installerConfig = config.getOptionalConfig("providerInstaller");
    if (!installerConfig) {
      options.logger.info("No provider installer configuration found");
      return undefined;
    }

    const settings = readInstallerConfig(config);
    const cluster = new ClusterClient({
      cluster: settings.cluster,
      logger: options.logger,
    });

    options.logger.info(
      `Creating ProviderInstaller with ${settings.providers.length} provider(s)`,
    );

    return new ProviderInstaller({
      inventory: new InventoryClient({ store: cluster, logger: options.logger }),
      applier: cluster,
      variables: ConfigVariablesSource.fromConfig(config),
      logger: options.logger,
      providers: settings.providers.map(toInstallRequest),
      schedule: readSchedule(installerConfig.getOptionalConfig("schedule")),
    });
  }

  constructor(options: ProviderInstallerOptions) {
    this.logger = options.logger.child({ plugin: "provider-installer" });
    this.inventory = options.inventory;
    this.applier = options.applier;
    this.variables = options.variables;
    this.providers = options.providers ?? [];
    this.schedule = options.schedule ?? readSchedule(undefined);
  }

  getSchedule(): SchedulerServiceTaskScheduleDefinition {
    return this.schedule;
  }

  getProviders(): InstallRequest[] {
    return [...this.providers];
  }

  /**
   * Build the provider's components, check them against the inventory,
   * create them and record the new instance.
   */
  async install(
    request: InstallRequest,
    ctx: OperationContext = BACKGROUND,
  ): Promise<Components> {
    const components = await new ComponentsClient({
      provider: { name: request.name, type: request.type },
      repository: request.repository,
      variables: this.variables,
      version: request.version,
    }).get({
      flavor: request.flavor,
      bootstrap: request.bootstrap,
      targetNamespace: request.targetNamespace,
      watchingNamespace: request.watchingNamespace,
    });

    const record = components.inventoryRecord();
    const key = providerKey(record);

    await this.inventory.validate(record, ctx);

    this.logger.info(
      `ProviderInstaller[${key}] installing ${record.type} ${record.version} (${components.objects().length} objects)`,
    );
    await this.applier.apply(components.objects(), ctx);
    await this.inventory.create(record, ctx);

    this.logger.info(
      `ProviderInstaller[${key}] installed ${record.version}` +
        (record.watchedNamespace
          ? `, watching namespace ${record.watchedNamespace}`
          : ", watching all namespaces"),
    );
    return components;
  }

  /**
   * Install every configured provider that is not in the inventory yet, in
   * configuration order. Returns the providers installed by this run.
   */
  async run(ctx: OperationContext = BACKGROUND): Promise<Components[]> {
    const startTime = Date.now();
    const installed: Components[] = [];

    for (const request of this.providers) {
      checkContext(ctx);
      try {
        if (await this.isInstalled(request, ctx)) {
          this.logger.debug(
            `ProviderInstaller[${request.name}] already installed, skipping`,
          );
          continue;
        }
        installed.push(await this.install(request, ctx));
      } catch (error) {
        this.logger.error(
          `ProviderInstaller[${request.name}] install failed: ${error}`,
        );
        throw error;
      }
    }

    const duration = Date.now() - startTime;
    this.logger.info(
      `ProviderInstaller run completed in ${duration}ms: ${installed.length} provider(s) installed`,
    );
    return installed;
  }

  private async isInstalled(
    request: InstallRequest,
    ctx: OperationContext,
  ): Promise<boolean> {
    const instances = await this.inventory.list({ name: request.name }, ctx);
    if (request.targetNamespace) {
      return instances.some(
        (instance) => instance.namespace === request.targetNamespace,
      );
    }
    // Without a target namespace the manifest decides; any instance counts.
    return instances.length > 0;
  }
}

// ============================================================================
// Config Parsing
// ============================================================================

export function readInstallerConfig(config: Config): ProviderInstallerConfig {
  const installerConfig = config.getOptionalConfig("providerInstaller");
  return {
    cluster: readCluster(installerConfig?.getOptionalConfig("cluster")),
    variables: readConfigVariables(config),
    providers: (installerConfig?.getOptionalConfigArray("providers") ?? []).map(
      readProvider,
    ),
  };
}

function readCluster(config?: Config): ClusterConnectionConfig | undefined {
  if (!config) {
    return undefined;
  }
  return {
    name: config.getOptionalString("name") ?? "management",
    url: config.getOptionalString("url") ?? "https://kubernetes.default.svc",
    token: config.getOptionalString("token"),
    caData: config.getOptionalString("caData"),
    skipTLSVerify: config.getOptionalBoolean("skipTLSVerify") ?? false,
  };
}

function readProvider(config: Config): ProviderInstallConfig {
  const name = config.getString("name");
  const typeValue = config.getString("type");
  const type = parseProviderType(typeValue);
  if (!type) {
    throw new Error(
      `Invalid type "${typeValue}" for provider "${name}" in providerInstaller.providers`,
    );
  }

  return {
    name,
    type,
    path: config.getString("path"),
    version: config.getOptionalString("version"),
    targetNamespace: config.getOptionalString("targetNamespace"),
    watchingNamespace: config.getOptionalString("watchingNamespace"),
    flavor: config.getOptionalString("flavor"),
    bootstrap: config.getOptionalString("bootstrap"),
  };
}

function toInstallRequest(provider: ProviderInstallConfig): InstallRequest {
  const { path, ...rest } = provider;
  return {
    ...rest,
    repository: new FileSystemRepository({
      rootPath: path,
      defaultVersion: provider.version,
    }),
  };
}

function readSchedule(config?: Config): SchedulerServiceTaskScheduleDefinition {
  const frequencyMinutes = config?.getOptionalNumber("frequency.minutes") ?? 30;
  const timeoutMinutes = config?.getOptionalNumber("timeout.minutes") ?? 10;
  const initialDelaySeconds =
    config?.getOptionalNumber("initialDelay.seconds") ?? 15;

  return {
    frequency: Duration.fromObject({ minutes: frequencyMinutes }),
    timeout: Duration.fromObject({ minutes: timeoutMinutes }),
    initialDelay: Duration.fromObject({ seconds: initialDelaySeconds }),
  };
}
