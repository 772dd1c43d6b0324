import { ManifestDocument } from "./manifest";
import { DEPLOYMENT_KIND } from "./watchNamespace";

/**
 * Container images used by the manifest's Deployments, in document order;
 * within a Deployment, containers come before init containers.
 */
export function inspectImages(docs: ReadonlyArray<ManifestDocument>): string[] {
  const images: string[] = [];

  for (const doc of docs) {
    if (doc.kind !== DEPLOYMENT_KIND) {
      continue;
    }
    const containers = [
      ...doc.containers("containers"),
      ...doc.containers("initContainers"),
    ];
    for (const container of containers) {
      if (typeof container.image === "string" && container.image !== "") {
        images.push(container.image);
      }
    }
  }

  return images;
}
