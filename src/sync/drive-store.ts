/**
 * Remote store backed by a Google Drive folder, talking to the Drive v3 REST
 * API with a bearer token. Locations are Drive file ids.
 */
import fs from 'node:fs';
import { z } from 'zod';
import type { RemoteStore, StoredDocument } from './remote-store.js';
import type { RemoteFileState } from './types.js';
import { REMOTE_EXTENSION } from './types.js';
import { RemoteAccessError, errorMessage } from './errors.js';

export const DOCX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';
export const DEFAULT_DRIVE_API_URL = 'https://www.googleapis.com';

const driveFileSchema = z.object({
  id: z.string(),
  name: z.string(),
  modifiedTime: z.string().optional(),
});

const fileListSchema = z.object({
  nextPageToken: z.string().optional(),
  files: z.array(driveFileSchema).default([]),
});

const errorBodySchema = z.object({
  error: z.object({
    message: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional() }).passthrough()).default([]),
  }).passthrough(),
});

type DriveFile = z.infer<typeof driveFileSchema>;

/** 403 reasons that mean "slow down", not "forbidden" */
const RATE_LIMIT_REASONS = new Set(['userRateLimitExceeded', 'rateLimitExceeded']);

export interface DriveRemoteStoreOptions {
  accessToken: string;
  folderId: string;
  /** Label used in output; defaults to the folder id */
  folderName?: string;
  apiUrl?: string;
  fetch?: typeof fetch;
  /** Retries for transient failures (429, 5xx, network) */
  maxRetries?: number;
  /** Base delay of the exponential backoff */
  retryDelayMs?: number;
}

/**
 * Non-2xx response from the Drive API.
 */
export class DriveApiError extends Error {
  constructor(
    public status: number,
    message: string,
    public reasons: string[] = [],
  ) {
    super(message);
    this.name = 'DriveApiError';
  }

  get rateLimited(): boolean {
    return this.status === 429 || this.reasons.some(reason => RATE_LIMIT_REASONS.has(reason));
  }
}

/**
 * Pull `error.errors[].reason` out of a Drive error body. Bodies that are not
 * Drive's JSON error shape carry no reasons.
 */
export function parseErrorReasons(body: string): string[] {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return [];
  }
  const parsed = errorBodySchema.safeParse(raw);
  if (!parsed.success) return [];
  return parsed.data.error.errors.flatMap(e => (e.reason ? [e.reason] : []));
}

/**
 * Quote a value for a Drive search query.
 */
export function quoteQueryValue(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * Thin Drive v3 client shared by the store and folder resolution during init.
 */
export class DriveClient {
  private apiUrl: string;
  private fetchImpl: typeof fetch;
  private maxRetries: number;
  private retryDelayMs: number;

  constructor(private readonly accessToken: string, options: Omit<DriveRemoteStoreOptions, 'accessToken' | 'folderId' | 'folderName'> = {}) {
    this.apiUrl = (options.apiUrl ?? DEFAULT_DRIVE_API_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 500;
  }

  async listFiles(query: string, signal?: AbortSignal): Promise<DriveFile[]> {
    const files: DriveFile[] = [];
    let pageToken: string | undefined;
    do {
      const params = new URLSearchParams({
        q: query,
        spaces: 'drive',
        pageSize: '1000',
        fields: 'nextPageToken,files(id,name,modifiedTime)',
      });
      if (pageToken) params.set('pageToken', pageToken);
      const res = await this.request('GET', `/drive/v3/files?${params.toString()}`, {}, signal);
      const page = fileListSchema.parse(await res.json());
      files.push(...page.files);
      pageToken = page.nextPageToken;
    } while (pageToken);
    return files;
  }

  async createFile(metadata: { name: string; mimeType: string; parents?: string[] }, signal?: AbortSignal): Promise<DriveFile> {
    const res = await this.request('POST', '/drive/v3/files?fields=id,name,modifiedTime', {
      contentType: 'application/json',
      body: JSON.stringify(metadata),
    }, signal);
    return driveFileSchema.parse(await res.json());
  }

  async uploadContent(fileId: string, content: Buffer, mimeType: string, signal?: AbortSignal): Promise<DriveFile> {
    const res = await this.request(
      'PATCH',
      `/upload/drive/v3/files/${encodeURIComponent(fileId)}?uploadType=media&fields=id,name,modifiedTime`,
      { contentType: mimeType, body: content },
      signal,
    );
    return driveFileSchema.parse(await res.json());
  }

  async download(fileId: string, signal?: AbortSignal): Promise<Buffer> {
    const res = await this.request('GET', `/drive/v3/files/${encodeURIComponent(fileId)}?alt=media`, {}, signal);
    return Buffer.from(await res.arrayBuffer());
  }

  /**
   * Find a top-level folder by name, creating it when missing.
   */
  async findOrCreateFolder(name: string, signal?: AbortSignal): Promise<{ id: string; name: string; created: boolean }> {
    const query = `name=${quoteQueryValue(name)} and mimeType=${quoteQueryValue(FOLDER_MIME_TYPE)} and trashed=false`;
    const [existing] = await this.listFiles(query, signal);
    if (existing) {
      return { id: existing.id, name: existing.name, created: false };
    }
    const folder = await this.createFile({ name, mimeType: FOLDER_MIME_TYPE }, signal);
    return { id: folder.id, name: folder.name, created: true };
  }

  private async request(
    method: 'GET' | 'POST' | 'PATCH',
    pathAndQuery: string,
    payload: { contentType?: string; body?: string | Buffer },
    signal?: AbortSignal,
  ): Promise<Response> {
    const headers: Record<string, string> = { Authorization: `Bearer ${this.accessToken}` };
    if (payload.contentType) headers['Content-Type'] = payload.contentType;

    return retryWithBackoff(async () => {
      const res = await this.fetchImpl(this.apiUrl + pathAndQuery, {
        method,
        headers,
        body: payload.body,
        signal,
      });
      if (res.ok) return res;

      const body = await res.text();
      if (res.status === 401) {
        throw new RemoteAccessError(
          'Google Drive rejected the credentials (HTTP 401). Refresh the access token and try again.',
          res.status,
        );
      }
      // 403 covers rate limits and per-file permissions; only the folder
      // listing turns it into a fatal error.
      throw new DriveApiError(res.status, `Drive API error ${res.status}: ${body.slice(0, 200)}`, parseErrorReasons(body));
    }, this.maxRetries, this.retryDelayMs, signal);
  }
}

export class DriveRemoteStore implements RemoteStore {
  readonly description: string;
  private client: DriveClient;
  private folderId: string;

  constructor(options: DriveRemoteStoreOptions) {
    this.client = new DriveClient(options.accessToken, options);
    this.folderId = options.folderId;
    this.description = `Google Drive folder ${options.folderName ?? options.folderId}`;
  }

  async listDocuments(signal?: AbortSignal): Promise<RemoteFileState[]> {
    const query = `${quoteQueryValue(this.folderId)} in parents and mimeType=${quoteQueryValue(DOCX_MIME_TYPE)} and trashed=false`;
    let files: DriveFile[];
    try {
      files = await this.client.listFiles(query, signal);
    } catch (err) {
      if (err instanceof RemoteAccessError) throw err;
      throw new RemoteAccessError(
        `Cannot list ${this.description}: ${errorMessage(err)}`,
        err instanceof DriveApiError ? err.status : undefined,
      );
    }

    const docs: RemoteFileState[] = [];
    for (const file of files) {
      if (!file.name.endsWith(REMOTE_EXTENSION) || !file.modifiedTime) continue;
      const modifiedAt = new Date(file.modifiedTime);
      if (Number.isNaN(modifiedAt.getTime())) continue;
      docs.push({ name: file.name, location: file.id, modifiedAt });
    }
    return docs.sort((a, b) => a.name.localeCompare(b.name));
  }

  async fetch(location: string, destPath: string, signal?: AbortSignal): Promise<void> {
    const content = await this.client.download(location, signal);
    await fs.promises.writeFile(destPath, content);
  }

  async store(name: string, sourcePath: string, signal?: AbortSignal): Promise<StoredDocument> {
    const content = await fs.promises.readFile(sourcePath);
    const query = `name=${quoteQueryValue(name)} and ${quoteQueryValue(this.folderId)} in parents and trashed=false`;
    const [existing] = await this.client.listFiles(query, signal);
    const fileId = existing
      ? existing.id
      : (await this.client.createFile({ name, mimeType: DOCX_MIME_TYPE, parents: [this.folderId] }, signal)).id;
    const uploaded = await this.client.uploadContent(fileId, content, DOCX_MIME_TYPE, signal);
    const modifiedAt = uploaded.modifiedTime ? new Date(uploaded.modifiedTime) : undefined;
    return {
      location: uploaded.id,
      modifiedAt: modifiedAt && !Number.isNaN(modifiedAt.getTime()) ? modifiedAt : undefined,
    };
  }
}

/**
 * Retry a function with exponential backoff (500ms, 1s, 2s by default).
 * Credential errors, client errors other than rate limits, and aborts are not
 * retried. An abort during the backoff delay ends the wait at once.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  maxRetries = 3,
  baseDelayMs = 500,
  signal?: AbortSignal,
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (!isTransient(err) || signal?.aborted) {
        throw err;
      }
      if (attempt < maxRetries) {
        await sleep(Math.pow(2, attempt) * baseDelayMs, signal);
      }
    }
  }
  throw lastError;
}

function isTransient(err: unknown): boolean {
  if (err instanceof RemoteAccessError) return false;
  if (err instanceof DriveApiError) return err.rateLimited || err.status >= 500;
  if (err instanceof Error && err.name === 'AbortError') return false;
  // network failures surface as TypeError from fetch
  return err instanceof TypeError;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
