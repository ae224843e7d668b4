/**
 * Test Helpers
 *
 * Temporary directories, a fake extraction provider and an in-process HTTP
 * server that stands in for the OpenAI and Anthropic APIs.
 */

import fs from 'fs';
import http from 'node:http';
import os from 'os';
import path from 'path';
import {
  loadExtractionSchema,
  resolveBundledSchemaPath,
  type Config,
  type ExtractionOutcome,
  type ExtractionProvider,
  type ExtractionRecord,
  type ExtractionSchema,
  type LoadedDocument,
} from '@invoice-digest/shared';

/**
 * Create an empty temporary directory
 */
export async function makeTempDir(prefix = 'invoice-digest-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(directory: string): Promise<void> {
  await fs.promises.rm(directory, { recursive: true, force: true });
}

/**
 * Create files (name -> content) in a directory
 */
export async function writeFiles(directory: string, files: Record<string, string | Buffer>): Promise<void> {
  await fs.promises.mkdir(directory, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await fs.promises.writeFile(path.join(directory, name), content);
  }
}

export async function listDir(directory: string): Promise<string[]> {
  return (await fs.promises.readdir(directory)).sort();
}

export async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
}

export function invoiceSchema(): ExtractionSchema {
  return loadExtractionSchema(resolveBundledSchemaPath('invoice.schema.json'));
}

/**
 * A complete run configuration pointing at the given directories
 */
export function makeConfig(
  inputDir: string,
  outputDir: string,
  overrides: Partial<Config> = {}
): Config {
  return {
    provider: 'openai',
    model: 'fake-model',
    apiKey: 'test-secret',
    inputDir,
    outputDir,
    schemaPath: resolveBundledSchemaPath('invoice.schema.json'),
    schema: invoiceSchema(),
    failurePolicy: 'continue',
    requestTimeoutMs: 5000,
    maxRetries: 0,
    maxTokens: 1024,
    maxExtractionChars: 35000,
    ...overrides,
  };
}

type FakeResponse = ExtractionRecord | Error;

/**
 * Provider that answers from a function of the document, recording each call
 */
export class FakeProvider implements ExtractionProvider {
  readonly name = 'openai';
  readonly model = 'fake-model';
  readonly calls: string[] = [];

  constructor(private readonly respond: (document: LoadedDocument) => FakeResponse) {}

  async extract(document: LoadedDocument): Promise<ExtractionOutcome> {
    this.calls.push(document.ref.id);
    const response = this.respond(document);
    if (response instanceof Error) {
      throw response;
    }
    return {
      record: response,
      metadata: {
        provider: this.name,
        model: this.model,
        requestId: `fake_${this.calls.length}`,
        promptVersion: 'test',
        mode: document.mode,
        durationMs: 1,
      },
    };
  }
}

// ============================================================================
// Stub HTTP server
// ============================================================================

export interface RecordedRequest {
  method: string;
  url: string;
  body: unknown;
}

export interface StubReply {
  status: number;
  body: unknown;
}

export type StubHandler = (request: RecordedRequest) => StubReply;

export interface StubServer {
  /** http://127.0.0.1:<port> */
  url: string;
  requests: RecordedRequest[];
  respondWith(handler: StubHandler): void;
  close(): Promise<void>;
}

/**
 * Start an HTTP server on a free local port that records every JSON request
 * and answers with the current handler
 */
export async function startStubServer(): Promise<StubServer> {
  const requests: RecordedRequest[] = [];
  let handler: StubHandler = () => ({ status: 500, body: { error: { message: 'no stub reply' } } });

  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const text = Buffer.concat(chunks).toString('utf-8');
      const recorded: RecordedRequest = {
        method: req.method ?? 'GET',
        url: req.url ?? '/',
        body: text ? JSON.parse(text) : undefined,
      };
      requests.push(recorded);

      const reply = handler(recorded);
      res.writeHead(reply.status, { 'content-type': 'application/json' });
      res.end(JSON.stringify(reply.body));
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Stub server is not listening on a TCP port');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    requests,
    respondWith(next: StubHandler) {
      handler = next;
    },
    close() {
      return new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      });
    },
  };
}

/**
 * Minimal Chat Completions response body
 */
export function chatCompletion(
  content: string | null,
  options: { finishReason?: string; refusal?: string } = {}
): unknown {
  return {
    id: 'chatcmpl-test-1',
    object: 'chat.completion',
    created: 1700000000,
    model: 'gpt-4o-mini',
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content, refusal: options.refusal ?? null },
        finish_reason: options.finishReason ?? 'stop',
        logprobs: null,
      },
    ],
    usage: { prompt_tokens: 20, completion_tokens: 10, total_tokens: 30 },
  };
}

/**
 * Minimal Messages API response body
 */
export function anthropicMessage(content: unknown[], stopReason = 'tool_use'): unknown {
  return {
    id: 'msg_test_1',
    type: 'message',
    role: 'assistant',
    model: 'claude-test',
    content,
    stop_reason: stopReason,
    stop_sequence: null,
    usage: { input_tokens: 12, output_tokens: 8 },
  };
}
