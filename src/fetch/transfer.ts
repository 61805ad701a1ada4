/**
 * Response body placement.
 *
 * A body is streamed into a temporary sibling of the final path and renamed
 * into place only after it is verified. On any failure the temporary file is
 * removed, so the final path holds either a complete artifact or nothing.
 */

import { createWriteStream } from "node:fs";
import { stat } from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import type { Readable } from "node:stream";
import {
  commitArtifact,
  discardArtifact,
  hasPdfSignature,
  temporaryPathFor,
} from "../store/index.js";

/**
 * A response arrived but its body cannot be accepted.
 */
export class TransferError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransferError";
  }
}

export interface TransferOptions {
  /** Declared Content-Length, when the server sent one for an unencoded body */
  expectedLength?: number;
  /** Require the %PDF signature */
  verifyPdf: boolean;
}

/**
 * Content-Length as a number, or undefined when absent or unusable.
 * Bodies with a content encoding are measured after decoding, so their
 * declared length is not comparable.
 */
export function declaredLength(contentLength: unknown, contentEncoding?: unknown): number | undefined {
  const encoding = typeof contentEncoding === "string" ? contentEncoding.trim().toLowerCase() : "";
  if (encoding !== "" && encoding !== "identity") {
    return undefined;
  }
  const raw = Array.isArray(contentLength) ? contentLength[0] : contentLength;
  if (typeof raw !== "string" && typeof raw !== "number") {
    return undefined;
  }
  const length = Number(raw);
  return Number.isInteger(length) && length >= 0 ? length : undefined;
}

/**
 * Stream a body to finalPath through a temporary file.
 *
 * @returns Bytes written
 * @throws TransferError when the body is empty, truncated or not a PDF
 */
export async function saveResponseBody(
  body: Readable,
  finalPath: string,
  options: TransferOptions
): Promise<number> {
  const tempPath = temporaryPathFor(finalPath);

  try {
    await pipeline(body, createWriteStream(tempPath));
    const { size } = await stat(tempPath);

    if (size === 0) {
      throw new TransferError("Empty response body");
    }
    if (options.expectedLength !== undefined && size !== options.expectedLength) {
      throw new TransferError(
        `Incomplete body: received ${size} of ${options.expectedLength} bytes`
      );
    }
    if (options.verifyPdf && !(await hasPdfSignature(tempPath))) {
      throw new TransferError("Response body is not a PDF");
    }

    await commitArtifact(tempPath, finalPath);
    return size;
  } catch (err) {
    await discardArtifact(tempPath);
    throw err;
  }
}
