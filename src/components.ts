/**
 * Provider Components
 *
 * Turns a provider's raw manifest into the set of objects to install: the
 * variables are substituted, every object is moved into the target
 * namespace, cluster-wide RBAC is made unique to this instance, the
 * controllers are told which namespace to watch and everything is labelled
 * with the owning provider.
 */

import type { JsonObject } from "@backstage/types";
import { MissingTargetNamespaceError } from "./errors";
import { inspectImages } from "./images";
import { addLabels } from "./labels";
import {
  ManifestDocument,
  parseDocuments,
  serializeDocuments,
} from "./manifest";
import { addNamespaceIfMissing, inspectTargetNamespace } from "./namespaces";
import { fixRBAC } from "./rbac";
import { ProviderRecord, ProviderType } from "./types";
import { VariablesSource, inspectVariables, replaceVariables } from "./variables";
import { fixWatchNamespace } from "./watchNamespace";

export interface ProviderIdentity {
  name: string;
  type: ProviderType;
}

export interface ComponentsInput {
  provider: ProviderIdentity;
  version: string;
  rawYaml: string;
  variables: VariablesSource;
  /** Defaults to the Namespace object defined by the manifest */
  targetNamespace?: string;
  /** "" (the default) lets the controllers watch all namespaces */
  watchingNamespace?: string;
}

interface ComponentsState {
  provider: ProviderIdentity;
  version: string;
  variables: string[];
  images: string[];
  targetNamespace: string;
  watchingNamespace: string;
  objects: ReadonlyArray<ManifestDocument>;
  yaml: string;
}

/**
 * The install-ready objects of one provider instance. Immutable; accessors
 * hand out copies.
 */
export class Components {
  private constructor(private readonly state: ComponentsState) {}

  /** @internal */
  static of(state: ComponentsState): Components {
    return new Components(state);
  }

  name(): string {
    return this.state.provider.name;
  }

  type(): ProviderType {
    return this.state.provider.type;
  }

  version(): string {
    return this.state.version;
  }

  targetNamespace(): string {
    return this.state.targetNamespace;
  }

  watchingNamespace(): string {
    return this.state.watchingNamespace;
  }

  variables(): string[] {
    return [...this.state.variables];
  }

  images(): string[] {
    return [...this.state.images];
  }

  objects(): ManifestDocument[] {
    return this.state.objects.map((doc) => doc.clone());
  }

  rawObjects(): JsonObject[] {
    return this.state.objects.map((doc) => doc.toObject());
  }

  yaml(): string {
    return this.state.yaml;
  }

  /** The inventory record describing this instance once installed. */
  inventoryRecord(): ProviderRecord {
    return {
      name: this.state.provider.name,
      namespace: this.state.targetNamespace,
      type: this.state.provider.type,
      version: this.state.version,
      watchedNamespace: this.state.watchingNamespace,
    };
  }
}

export function buildComponents(input: ComponentsInput): Components {
  const variables = inspectVariables(input.rawYaml);
  const yaml = replaceVariables(input.rawYaml, variables, input.variables);

  let objects = parseDocuments(yaml);

  // Always inspected: a manifest with two Namespace objects is rejected even
  // when the caller picks the namespace.
  const manifestNamespace = inspectTargetNamespace(objects);
  const targetNamespace = input.targetNamespace || manifestNamespace;
  if (targetNamespace === "") {
    throw new MissingTargetNamespaceError(input.provider.name);
  }

  const watchingNamespace = input.watchingNamespace ?? "";

  objects = addNamespaceIfMissing(objects, targetNamespace);
  objects = fixRBAC(objects, targetNamespace);
  objects = fixWatchNamespace(objects, watchingNamespace);
  objects = addLabels(objects, input.provider.name);

  return Components.of({
    provider: { ...input.provider },
    version: input.version,
    variables,
    images: inspectImages(objects),
    targetNamespace,
    watchingNamespace,
    objects,
    yaml: serializeDocuments(objects),
  });
}
