import {
  CreateBucketCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  NoSuchBucket,
  NoSuchKey,
  NotFound,
  PutObjectCommand,
  type S3Client
} from '@aws-sdk/client-s3';

import type { ObjectStore } from '../../src/storage/objectStore';

function commandName(command: unknown): string {
  return typeof command === 'object' && command !== null ? command.constructor.name : 'unknown';
}

/** Answers the S3 commands the object store sends, against a Map. */
export class InMemoryS3Client {
  readonly objects = new Map<string, { body: Uint8Array; contentType: string | undefined }>();
  readonly sent: string[] = [];
  bucketExists: boolean;
  private readonly pageSize: number;

  constructor(options: { bucketExists?: boolean; pageSize?: number } = {}) {
    this.bucketExists = options.bucketExists ?? true;
    this.pageSize = options.pageSize ?? 1000;
  }

  async send(command: unknown): Promise<unknown> {
    this.sent.push(commandName(command));

    if (command instanceof PutObjectCommand) {
      const key = command.input.Key;
      const body = command.input.Body;
      if (!key || !(body instanceof Uint8Array)) {
        throw new Error('Key and a byte body are required');
      }
      this.objects.set(key, { body, contentType: command.input.ContentType });
      return {};
    }

    if (command instanceof GetObjectCommand) {
      const entry = command.input.Key ? this.objects.get(command.input.Key) : undefined;
      if (!entry) {
        throw new NoSuchKey({ message: 'The specified key does not exist.', $metadata: { httpStatusCode: 404 } });
      }
      return { Body: { transformToByteArray: async () => entry.body } };
    }

    if (command instanceof HeadObjectCommand) {
      if (!command.input.Key || !this.objects.has(command.input.Key)) {
        throw new NotFound({ message: 'Not Found', $metadata: { httpStatusCode: 404 } });
      }
      return {};
    }

    if (command instanceof ListObjectsV2Command) {
      const prefix = command.input.Prefix ?? '';
      const keys = Array.from(this.objects.keys())
        .filter((key) => key.startsWith(prefix))
        .sort();
      const start = command.input.ContinuationToken ? Number.parseInt(command.input.ContinuationToken, 10) : 0;
      const slice = keys.slice(start, start + this.pageSize);
      const next = start + slice.length;
      return {
        Contents: slice.map((key) => ({ Key: key })),
        KeyCount: slice.length,
        IsTruncated: next < keys.length,
        NextContinuationToken: next < keys.length ? next.toString() : undefined
      };
    }

    if (command instanceof HeadBucketCommand) {
      if (!this.bucketExists) {
        throw new NoSuchBucket({ message: 'The specified bucket does not exist', $metadata: { httpStatusCode: 404 } });
      }
      return {};
    }

    if (command instanceof CreateBucketCommand) {
      this.bucketExists = true;
      return {};
    }

    throw new Error(`Unsupported command: ${commandName(command)}`);
  }

  asClient(): S3Client {
    return this as unknown as S3Client;
  }
}

/** ObjectStore fake for tests that do not care about the S3 wire shape. */
export class InMemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, Uint8Array>();
  readonly puts: string[] = [];
  failPutsFor = new Set<string>();

  async put(key: string, body: Uint8Array): Promise<void> {
    if (this.failPutsFor.has(key)) {
      throw new Error(`put rejected for ${key}`);
    }
    this.puts.push(key);
    this.objects.set(key, body);
  }

  async getMany(keys: readonly string[]): Promise<(Uint8Array | null)[]> {
    return keys.map((key) => this.objects.get(key) ?? null);
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  async list(prefix: string): Promise<string[]> {
    return Array.from(this.objects.keys())
      .filter((key) => key.startsWith(prefix))
      .sort();
  }

  async ensureBucket(): Promise<void> {}
}
