/**
 * Deterministic artifact locations.
 *
 * The artifact path is the identity used for idempotence: an item whose path
 * already exists is treated as downloaded.
 */

import { join } from "node:path";
import { slug } from "./slug.js";
import type { WorkItem } from "../types/index.js";

export const ARTIFACT_EXTENSION = ".pdf";

export interface ArtifactLocation {
  readonly topicSlug: string;
  readonly titleSlug: string;
  /** `<storeRoot>/<topicSlug>` */
  readonly directory: string;
  /** `<storeRoot>/<topicSlug>/<titleSlug>.pdf` */
  readonly path: string;
}

/**
 * Path of an artifact relative to the store root, with forward slashes.
 * This is the form the markdown index links to.
 */
export function relativeArtifactPath(topicSlug: string, titleSlug: string): string {
  return `${topicSlug}/${titleSlug}${ARTIFACT_EXTENSION}`;
}

export function artifactPath(storeRoot: string, topicSlug: string, titleSlug: string): string {
  return join(storeRoot, topicSlug, `${titleSlug}${ARTIFACT_EXTENSION}`);
}

/**
 * Resolve where a work item's artifact lives.
 */
export function locateArtifact(storeRoot: string, item: WorkItem): ArtifactLocation {
  const topicSlug = slug(item.topic);
  const titleSlug = slug(item.title);
  return {
    topicSlug,
    titleSlug,
    directory: join(storeRoot, topicSlug),
    path: artifactPath(storeRoot, topicSlug, titleSlug),
  };
}
