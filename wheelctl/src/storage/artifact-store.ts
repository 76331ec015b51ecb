import {
  ListObjectsV2Command,
  S3Client,
  type ListObjectsV2CommandOutput,
} from "@aws-sdk/client-s3";
import { StorageUnavailableError, errorMessage } from "../errors.js";

/** Read-only existence check over an object store. */
export interface ArtifactStore {
  hasKeyWithPrefix(prefix: string): Promise<boolean>;
}

/** The slice of `S3Client` the store uses. */
export type ListObjectsClient = {
  send(command: ListObjectsV2Command): Promise<ListObjectsV2CommandOutput>;
};

/**
 * S3 bucket lookups through `ListObjectsV2` bounded to one key.
 */
export class S3ArtifactStore implements ArtifactStore {
  private readonly client: ListObjectsClient;

  constructor(
    readonly bucket: string,
    opts: { region?: string; client?: ListObjectsClient } = {},
  ) {
    this.client = opts.client ?? new S3Client(opts.region ? { region: opts.region } : {});
  }

  async hasKeyWithPrefix(prefix: string): Promise<boolean> {
    let res: ListObjectsV2CommandOutput;
    try {
      res = await this.client.send(new ListObjectsV2Command({ Bucket: this.bucket, Prefix: prefix, MaxKeys: 1 }));
    } catch (e) {
      throw new StorageUnavailableError(
        `Storage lookup failed for s3://${this.bucket}/${prefix}: ${errorMessage(e)}`,
        { bucket: this.bucket, prefix },
        { cause: e },
      );
    }
    return (res.Contents ?? []).length > 0;
  }
}
