/**
 * Manifest Documents
 *
 * A provider manifest is a multi-document YAML stream. Each document is kept
 * as an open JSON tree; `ManifestDocument` exposes typed accessors for the
 * handful of fields the installer reads and writes, and everything else is
 * carried through untouched on reserialization.
 */

import { parseAllDocuments, stringify } from "yaml";
import type { JsonObject, JsonValue } from "@backstage/types";
import { ParseError } from "./errors";

export type ContainerList = "containers" | "initContainers";

// ============================================================================
// JSON Helpers
// ============================================================================

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(object: JsonObject, key: string): string | undefined {
  const value = object[key];
  return typeof value === "string" ? value : undefined;
}

function objectField(object: JsonObject, key: string): JsonObject | undefined {
  const value = object[key];
  return isJsonObject(value) ? value : undefined;
}

function objectItems(value: JsonValue | undefined): JsonObject[] {
  return Array.isArray(value) ? value.filter(isJsonObject) : [];
}

// ============================================================================
// ManifestDocument
// ============================================================================

export class ManifestDocument {
  private readonly object: JsonObject;

  constructor(object: JsonObject) {
    this.object = object;
  }

  get kind(): string {
    return stringField(this.object, "kind") ?? "";
  }

  get apiVersion(): string {
    return stringField(this.object, "apiVersion") ?? "";
  }

  get name(): string {
    const metadata = objectField(this.object, "metadata");
    return (metadata && stringField(metadata, "name")) ?? "";
  }

  set name(value: string) {
    this.ensureMetadata().name = value;
  }

  get namespace(): string | undefined {
    const metadata = objectField(this.object, "metadata");
    return metadata ? stringField(metadata, "namespace") : undefined;
  }

  set namespace(value: string | undefined) {
    if (value === undefined) {
      const metadata = objectField(this.object, "metadata");
      if (metadata) {
        delete metadata.namespace;
      }
      return;
    }
    this.ensureMetadata().namespace = value;
  }

  get labels(): Record<string, string> {
    return this.metadataStrings("labels");
  }

  get annotations(): Record<string, string> {
    return this.metadataStrings("annotations");
  }

  /** Merges the given labels into metadata.labels, creating it if needed. */
  addLabels(labels: Record<string, string>): void {
    const metadata = this.ensureMetadata();
    const current = objectField(metadata, "labels") ?? {};
    metadata.labels = { ...current, ...labels };
  }

  /**
   * The binding's roleRef, live. Mutating the returned object mutates the
   * document.
   */
  get roleRef(): JsonObject | undefined {
    return objectField(this.object, "roleRef");
  }

  /** The binding's subjects, live. */
  get subjects(): JsonObject[] {
    return objectItems(this.object.subjects);
  }

  /** Containers of the pod template (spec.template.spec), live. */
  containers(list: ContainerList = "containers"): JsonObject[] {
    const spec = objectField(this.object, "spec");
    const template = spec ? objectField(spec, "template") : undefined;
    const podSpec = template ? objectField(template, "spec") : undefined;
    return podSpec ? objectItems(podSpec[list]) : [];
  }

  /** Short identity used in messages, e.g. `ClusterRole manager-role`. */
  describe(): string {
    const namespace = this.namespace;
    const name = this.name || "<unnamed>";
    return `${this.kind || "<no kind>"} ${namespace ? `${namespace}/` : ""}${name}`;
  }

  clone(): ManifestDocument {
    return new ManifestDocument(structuredClone(this.object));
  }

  toObject(): JsonObject {
    return structuredClone(this.object);
  }

  private metadataStrings(key: string): Record<string, string> {
    const metadata = objectField(this.object, "metadata");
    const values = metadata ? objectField(metadata, key) : undefined;
    const result: Record<string, string> = {};
    for (const [name, value] of Object.entries(values ?? {})) {
      if (typeof value === "string") {
        result[name] = value;
      }
    }
    return result;
  }

  private ensureMetadata(): JsonObject {
    const existing = objectField(this.object, "metadata");
    if (existing) {
      return existing;
    }
    const metadata: JsonObject = {};
    this.object.metadata = metadata;
    return metadata;
  }
}

export function cloneDocuments(
  docs: ReadonlyArray<ManifestDocument>,
): ManifestDocument[] {
  return docs.map((doc) => doc.clone());
}

// ============================================================================
// YAML Stream Handling
// ============================================================================

/**
 * Split a multi-document YAML stream into documents, preserving their order.
 * Empty documents are skipped.
 */
export function parseDocuments(text: string): ManifestDocument[] {
  const documents: ManifestDocument[] = [];
  const parsed = parseAllDocuments(text);

  for (let index = 0; index < parsed.length; index++) {
    const doc = parsed[index];
    const position = String(index + 1);

    if (doc.errors.length > 0) {
      throw new ParseError(
        `failed to parse yaml document #${position}: ${doc.errors[0].message}`,
        { document: position },
      );
    }

    let value: unknown;
    try {
      value = doc.toJS();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ParseError(
        `failed to parse yaml document #${position}: ${detail}`,
        { document: position },
      );
    }
    if (value === null || value === undefined) {
      continue;
    }
    if (!isJsonObject(value)) {
      throw new ParseError(
        `yaml document #${position} is not a mapping of fields`,
        { document: position },
      );
    }
    documents.push(new ManifestDocument(value));
  }

  return documents;
}

export function serializeDocuments(
  docs: ReadonlyArray<ManifestDocument>,
): string {
  return docs.map((doc) => stringify(doc.toObject())).join("---\n");
}
