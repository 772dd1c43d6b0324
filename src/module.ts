/**
 * Backstage Backend Module for the Cluster API Provider Installer
 *
 * This module installs the configured Cluster API providers into a
 * management cluster on a schedule, and records each installed instance in
 * the provider inventory kept in that cluster.
 *
 * @packageDocumentation
 */

import {
  coreServices,
  createBackendModule,
} from "@backstage/backend-plugin-api";
import { ProviderInstaller } from "./installer";

/**
 * Kubernetes backend module that installs Cluster API providers.
 *
 * @example
 * ```ts
 * // In packages/backend/src/index.ts
 * import { createBackend } from '@backstage/backend-defaults';
 *
 * const backend = createBackend();
 * backend.add(import('@backstage/plugin-kubernetes-backend'));
 * backend.add(import('kubernetes-backend-module-provider-installer'));
 * backend.start();
 * ```
 *
 * @example
 * Configuration in app-config.yaml:
 * ```yaml
 * providerInstaller:
 *   cluster:
 *     name: management
 *     url: https://management.example.com:6443
 *     token: ${MANAGEMENT_CLUSTER_TOKEN}
 *   variables:
 *     EXP_CLUSTER_RESOURCE_SET: "true"
 *   providers:
 *     - name: cluster-api
 *       type: CoreProvider
 *       path: /var/lib/providers/cluster-api
 *       version: v1.7.0
 *     - name: docker
 *       type: infrastructure
 *       path: /var/lib/providers/docker
 *       targetNamespace: capd-system
 *       watchingNamespace: team-a
 *   schedule:
 *     frequency:
 *       minutes: 30
 *     timeout:
 *       minutes: 10
 * ```
 *
 * @public
 */
export const kubernetesModuleProviderInstaller = createBackendModule({
  pluginId: "kubernetes",
  moduleId: "provider-installer",
  register(env) {
    env.registerInit({
      deps: {
        config: coreServices.rootConfig,
        logger: coreServices.logger,
        scheduler: coreServices.scheduler,
      },
      async init({ config, logger, scheduler }) {
        const installer = ProviderInstaller.fromConfig(config, { logger });

        if (!installer || installer.getProviders().length === 0) {
          logger.info(
            "No providers to install. " +
              "Add providerInstaller.providers to your app-config.yaml to enable.",
          );
          return;
        }

        const schedule = installer.getSchedule();

        await scheduler.scheduleTask({
          id: "provider-installer:run",
          frequency: schedule.frequency,
          timeout: schedule.timeout,
          initialDelay: schedule.initialDelay,
          fn: async (signal) => {
            await installer.run({ signal });
          },
        });

        logger.info(
          `Scheduled installation of ${installer.getProviders().length} provider(s)`,
        );
      },
    });
  },
});

/**
 * Default export for convenience
 * @public
 */
export default kubernetesModuleProviderInstaller;
