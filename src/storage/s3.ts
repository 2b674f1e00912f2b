import https from "https";
import { Readable } from "stream";
import {
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import { NodeHttpHandler } from "@smithy/node-http-handler";
import type { S3Settings } from "../config";
import { notFound } from "../errors";
import type { BlobStorage } from "./types";

const httpsAgent = new https.Agent({ keepAlive: true });

function isMissing(err: unknown) {
  return (
    err instanceof S3ServiceException &&
    (err.name === "NoSuchKey" || err.name === "NotFound" || err.$metadata.httpStatusCode === 404)
  );
}

// Support both full URLs and hostname-only endpoints
function resolveEndpoint(settings: S3Settings) {
  if (settings.endpoint.startsWith("http")) {
    return settings.endpoint;
  }
  return `${settings.useSSL ? "https" : "http"}://${settings.endpoint}`;
}

export function createS3Client(settings: S3Settings): S3Client {
  const endpoint = resolveEndpoint(settings);
  console.log(`[S3] creating client for endpoint: ${endpoint}`);

  // Local MinIO needs path-style, otherwise the SDK resolves bucketname.localhost
  const forcePathStyle = /^(https?:\/\/)?(localhost|127\.0\.0\.1|minio)(:\d+)?(\/.*)?$/i.test(settings.endpoint);

  return new S3Client({
    endpoint,
    region: settings.region,
    credentials: {
      accessKeyId: settings.accessKey,
      secretAccessKey: settings.secretKey,
    },
    forcePathStyle,
    requestHandler: new NodeHttpHandler({
      httpsAgent,
      requestTimeout: 30000,
      connectionTimeout: 5000,
    }),
  });
}

export class S3BlobStorage implements BlobStorage {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string
  ) { }

  async put(key: string, data: Buffer, contentType: string): Promise<void> {
    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: this.bucket,
        Key: key,
        Body: data,
        ContentType: contentType,
      },
    });

    await upload.done();
    console.log(`[STORAGE] uploaded ${key} to s3://${this.bucket}`);
  }

  async get(key: string): Promise<Buffer> {
    const stream = await this.getStream(key);
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }

  async getStream(key: string): Promise<Readable> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!(response.Body instanceof Readable)) {
        throw new Error(`Empty response body for ${key}`);
      }
      return response.Body;
    } catch (err) {
      if (isMissing(err)) {
        throw notFound(`Stored file ${key} is missing`);
      }
      throw err;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async ping(): Promise<void> {
    await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
  }
}
