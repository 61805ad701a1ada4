/**
 * Record schema and type definitions.
 *
 * A records file is a sequence of papers. Each paper names one or more
 * topics (the first is its primary topic) and may list related papers, which
 * are filed under the parent's primary topic:
 *
 *   - title: Attention Is All You Need
 *     link: https://arxiv.org/pdf/1706.03762
 *     topics: [Transformers, NLP]
 *     related:
 *       - title: Layer Normalization
 *         link: https://arxiv.org/pdf/1607.06450
 *
 * The schema is lenient about content and strict about shape. A missing,
 * null or empty title or link is accepted here and skipped by the
 * deduplicator; a record that is not a mapping, or a field of the wrong
 * type, fails validation. Unknown fields (authors, year, notes) are dropped.
 */

import { z } from "zod";

/**
 * Free-text field. YAML reads `title: 1984` as a number, so numbers are
 * accepted and stringified; absent or null becomes "". Text is kept as
 * written, surrounding spaces included, so `" X "` slugs to `_X_`.
 */
const TextField = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? "" : String(value)));

export const RelatedRecordSchema = z.object({
  title: TextField.describe("Display title of the related paper"),
  link: TextField.describe("Source URL; the deduplication key"),
});

export const PaperRecordSchema = z.object({
  title: TextField.describe("Display title of the paper"),
  link: TextField.describe("Source URL; the deduplication key"),
  topics: z
    .array(TextField)
    .nullish()
    .transform((value) => value ?? [])
    .describe("Topics; the first is the primary topic"),
  related: z
    .array(RelatedRecordSchema)
    .nullish()
    .transform((value) => value ?? [])
    .describe("Related papers filed under this paper's primary topic"),
});

export const RecordCollectionSchema = z.array(PaperRecordSchema);

export type RelatedRecord = z.infer<typeof RelatedRecordSchema>;
export type PaperRecord = z.infer<typeof PaperRecordSchema>;
