/**
 * Artifact store: slugging, deterministic paths and safe file placement.
 */

export { slug } from "./slug.js";
export {
  ARTIFACT_EXTENSION,
  artifactPath,
  locateArtifact,
  relativeArtifactPath,
  type ArtifactLocation,
} from "./paths.js";
export {
  PDF_SIGNATURE,
  artifactExists,
  commitArtifact,
  discardArtifact,
  ensureDirectory,
  hasPdfSignature,
  readLeadingBytes,
  temporaryPathFor,
} from "./artifacts.js";
