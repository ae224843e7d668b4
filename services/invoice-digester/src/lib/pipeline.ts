/**
 * Digest Pipeline
 *
 * configuration -> enumerate -> (per document) load -> extract -> write.
 * Documents are processed one at a time, in file-name order.
 */

import { ulid } from 'ulid';
import {
  DigestError,
  documentsProcessedCounter,
  extractionDurationHistogram,
  logger,
  runForDocument,
  runWithContextAsync,
  type Config,
  type DocumentFailure,
  type DocumentRef,
  type DocumentSuccess,
  type ExtractionOutcome,
  type ExtractionProvider,
  type RunSummary,
} from '@invoice-digest/shared';
import { enumerateDocuments } from './documents';
import { createDocumentLoader, type DocumentLoader } from './loader';
import { planOutputNames, prepareOutputDir, writeResult } from './output';

export interface DigestDependencies {
  provider: ExtractionProvider;
  /** Defaults to the filesystem loader (pdfjs for PDFs) */
  loadDocument?: DocumentLoader;
}

type DocumentOutcome =
  | { ok: true; success: DocumentSuccess }
  | { ok: false; failure: DocumentFailure; error: DigestError };

interface DocumentJob {
  ref: DocumentRef;
  outputName: string;
  config: Readonly<Config>;
  provider: ExtractionProvider;
  loadDocument: DocumentLoader;
}

/**
 * Load, extract and write one document.
 *
 * Load and extraction failures are returned as a failure outcome, unlogged
 * (no file is written); output write failures are thrown.
 */
async function digestDocument(job: DocumentJob): Promise<DocumentOutcome> {
  const { ref, config, provider } = job;
  const startTime = Date.now();

  let outcome: ExtractionOutcome;
  try {
    const document = await job.loadDocument(ref);
    outcome = await provider.extract(document, config.schema);
  } catch (error) {
    const failure = DigestError.fromUnknown(error);
    documentsProcessedCounter.inc({ mode: 'none', status: 'failed' });

    return {
      ok: false,
      error: failure,
      failure: {
        documentId: ref.id,
        category: failure.category,
        reason: typeof failure.details?.reason === 'string' ? failure.details.reason : undefined,
        message: failure.message,
      },
    };
  }

  const outputPath = await writeResult(config.outputDir, job.outputName, outcome.record);

  const durationMs = Date.now() - startTime;
  const mode = outcome.metadata.mode;
  documentsProcessedCounter.inc({ mode, status: 'success' });
  extractionDurationHistogram.observe({ mode }, durationMs / 1000);

  logger.info('Document digested', {
    document_id: ref.id,
    mode,
    model: outcome.metadata.model,
    request_id: outcome.metadata.requestId,
    tokens_used: outcome.metadata.tokensUsed,
    duration_ms: durationMs,
  });

  return { ok: true, success: { documentId: ref.id, outputPath, mode, durationMs } };
}

/**
 * Run the whole pipeline once.
 *
 * @throws IOError if the input directory is missing (before anything is
 *   written) or an output file cannot be written
 * @throws the document's error when failurePolicy is 'abort'
 */
export async function runDigest(
  config: Readonly<Config>,
  deps: DigestDependencies
): Promise<RunSummary> {
  const runId = ulid();

  return runWithContextAsync({ correlationId: runId }, async () => {
    const startTime = Date.now();

    logger.info('Starting digest run', {
      provider: deps.provider.name,
      model: deps.provider.model,
      input_dir: config.inputDir,
      output_dir: config.outputDir,
      schema_path: config.schemaPath,
      failure_policy: config.failurePolicy,
    });

    const documents = Array.from(await enumerateDocuments(config.inputDir));
    await prepareOutputDir(config.outputDir);

    const outputNames = planOutputNames(documents);
    const loadDocument =
      deps.loadDocument ?? createDocumentLoader({ debugTextDir: config.debugTextDir });

    const summary: RunSummary = {
      runId,
      inputDir: config.inputDir,
      outputDir: config.outputDir,
      total: documents.length,
      succeeded: [],
      failed: [],
      skipped: [],
      durationMs: 0,
    };

    for (const ref of documents) {
      if (ref.kind === 'unsupported') {
        logger.warn('Skipping unsupported document', { document_id: ref.id });
        documentsProcessedCounter.inc({ mode: 'none', status: 'skipped' });
        summary.skipped.push({ documentId: ref.id, reason: `unsupported file type "${ref.extension}"` });
        continue;
      }

      const result = await runForDocument(ref.id, () =>
        digestDocument({
          ref,
          outputName: outputNames.get(ref.id) ?? `${ref.stem}.json`,
          config,
          provider: deps.provider,
          loadDocument,
        })
      );

      if (result.ok) {
        summary.succeeded.push(result.success);
        continue;
      }

      summary.failed.push(result.failure);
      // Under abort the caller reports the error
      if (config.failurePolicy === 'abort') {
        throw result.error;
      }

      logger.warn('Document failed, no output written', {
        document_id: ref.id,
        category: result.failure.category,
        details: result.error.details,
        error: result.failure.message,
      });
    }

    summary.durationMs = Date.now() - startTime;

    logger.info('Digest run complete', {
      total: summary.total,
      succeeded: summary.succeeded.length,
      failed: summary.failed.length,
      skipped: summary.skipped.length,
      failed_documents: summary.failed.map((f) => `${f.documentId}: ${f.message}`),
      duration_ms: summary.durationMs,
    });

    return summary;
  });
}

/**
 * Process exit code for a finished run: 1 when any document failed
 */
export function exitCodeFor(summary: RunSummary): number {
  return summary.failed.length > 0 ? 1 : 0;
}
