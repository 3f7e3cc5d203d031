/**
 * Document manifest
 *
 * JSON file listing each loan's documents as handed over by ingestion.
 * Re-read on every call so newly ingested documents are picked up by re-runs.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { EngineError, formatZodIssues } from '@loanledger/core';
import type { LoanDocument } from '@loanledger/core';
import type { DocumentSource } from '@loanledger/engine';

const hexHash = z.string().regex(/^[0-9a-fA-F]+$/, 'Expected a hex string');

const manifestDocumentSchema = z
  .object({
    id: z.string().min(1),
    pageCount: z.number().int().min(0),
    fileName: z.string().min(1).optional(),
    /** Text layer inline */
    content: z.string().optional(),
    /** Text layer in a file, relative to the manifest */
    contentPath: z.string().min(1).optional(),
    exactHash: hexHash.length(64).optional(),
    visualHashes: z
      .object({
        phash: hexHash.optional(),
        dhash: hexHash.optional(),
        ahash: hexHash.optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .refine((doc) => doc.content === undefined || doc.contentPath === undefined, {
    message: 'Give content or contentPath, not both',
  });

export const documentManifestSchema = z
  .object({
    loans: z.record(z.array(manifestDocumentSchema)),
  })
  .strict()
  .superRefine((manifest, ctx) => {
    for (const [loanId, documents] of Object.entries(manifest.loans)) {
      const seen = new Set<string>();
      for (const [index, doc] of documents.entries()) {
        if (seen.has(doc.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate document id ${doc.id}`,
            path: ['loans', loanId, index, 'id'],
          });
        }
        seen.add(doc.id);
      }
    }
  });

export type DocumentManifest = z.infer<typeof documentManifestSchema>;
type ManifestDocument = z.infer<typeof manifestDocumentSchema>;

export class ManifestDocumentSource implements DocumentSource {
  private readonly baseDir: string;

  constructor(private readonly manifestPath: string) {
    this.baseDir = dirname(manifestPath);
  }

  /**
   * @throws EngineError INVALID_CONFIG when the manifest is unreadable or invalid
   */
  async listDocuments(loanId: string): Promise<LoanDocument[]> {
    const manifest = await this.read();
    const entries = manifest.loans[loanId] ?? [];
    return Promise.all(entries.map((entry) => this.toDocument(loanId, entry)));
  }

  async listLoans(): Promise<string[]> {
    return Object.keys((await this.read()).loans).sort();
  }

  private async read(): Promise<DocumentManifest> {
    let raw: unknown;
    try {
      const text = await readFile(this.manifestPath, 'utf-8');
      raw = JSON.parse(text.replace(/^\uFEFF/, ''));
    } catch (err) {
      throw new EngineError({
        code: 'INVALID_CONFIG',
        message: `Failed to read document manifest ${this.manifestPath}: ${err instanceof Error ? err.message : String(err)}`,
        cause: err instanceof Error ? err : undefined,
      });
    }

    const result = documentManifestSchema.safeParse(raw);
    if (!result.success) {
      throw new EngineError({
        code: 'INVALID_CONFIG',
        message: `Invalid document manifest ${this.manifestPath}: ${formatZodIssues(result.error).join('; ')}`,
      });
    }
    return result.data;
  }

  private async toDocument(loanId: string, entry: ManifestDocument): Promise<LoanDocument> {
    const { contentPath, ...rest } = entry;
    if (contentPath === undefined) return { ...rest, loanId };

    const fullPath = resolve(this.baseDir, contentPath);
    try {
      return { ...rest, loanId, content: await readFile(fullPath, 'utf-8') };
    } catch (err) {
      throw new EngineError({
        code: 'MISSING_REFERENCE',
        message: `Cannot read content of document ${entry.id}: ${err instanceof Error ? err.message : String(err)}`,
        context: { loanId, documentId: entry.id },
      });
    }
  }
}
