import { ManifestDocument, cloneDocuments } from "./manifest";
import { LABEL_INSTALLER, LABEL_PROVIDER } from "./types";

export function providerLabels(providerName: string): Record<string, string> {
  return {
    [LABEL_INSTALLER]: "",
    [LABEL_PROVIDER]: providerName,
  };
}

/**
 * Stamp every object with the installer marker and the owning provider, so
 * that the provider's objects can be found again by label.
 */
export function addLabels(
  docs: ReadonlyArray<ManifestDocument>,
  providerName: string,
): ManifestDocument[] {
  const result = cloneDocuments(docs);
  const labels = providerLabels(providerName);
  for (const doc of result) {
    doc.addLabels(labels);
  }
  return result;
}
