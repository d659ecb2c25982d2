import {
  S3Client,
  CopyObjectCommand,
  GetObjectTaggingCommand,
  PutObjectTaggingCommand,
  DeleteObjectCommand,
  Tag,
} from '@aws-sdk/client-s3';
import { SNSClient, PublishCommand } from '@aws-sdk/client-sns';

export interface CopyObjectRequest {
  sourceBucket: string;
  sourceKey: string;
  destinationBucket: string;
  destinationKey: string;
  // Replaces the metadata of the source object on the copy
  metadata: Record<string, string>;
}

export interface TagObjectRequest {
  bucket: string;
  key: string;
  // Upserted into the tags the object already carries
  tags: Tag[];
}

export interface DeleteObjectRequest {
  bucket: string;
  key: string;
}

export interface ObjectStore {
  copyObject(request: CopyObjectRequest): Promise<void>;
  tagObject(request: TagObjectRequest): Promise<void>;
  deleteObject(request: DeleteObjectRequest): Promise<void>;
}

export interface Notification {
  subject: string;
  message: string;
}

export interface Notifier {
  publish(notification: Notification): Promise<void>;
}

// CopySource takes the key URL-encoded
export const copySource = (bucket: string, key: string): string =>
  `${bucket}/${encodeURIComponent(key)}`;

// Tags with the same key are overwritten, all others are kept
export function mergeTags(existing: Tag[], tags: Tag[]): Tag[] {
  const keys = new Set(tags.map((tag) => tag.Key));

  return [...existing.filter((tag) => !keys.has(tag.Key)), ...tags];
}

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly s3Client: S3Client) {}

  async copyObject(request: CopyObjectRequest): Promise<void> {
    await this.s3Client.send(
      new CopyObjectCommand({
        Bucket: request.destinationBucket,
        Key: request.destinationKey,
        CopySource: copySource(request.sourceBucket, request.sourceKey),
        MetadataDirective: 'REPLACE',
        Metadata: request.metadata,
      })
    );
  }

  async tagObject(request: TagObjectRequest): Promise<void> {
    const current = await this.s3Client.send(
      new GetObjectTaggingCommand({
        Bucket: request.bucket,
        Key: request.key,
      })
    );

    // PutObjectTagging replaces the whole set, so the current tags go back in
    await this.s3Client.send(
      new PutObjectTaggingCommand({
        Bucket: request.bucket,
        Key: request.key,
        Tagging: { TagSet: mergeTags(current.TagSet ?? [], request.tags) },
      })
    );
  }

  async deleteObject(request: DeleteObjectRequest): Promise<void> {
    await this.s3Client.send(
      new DeleteObjectCommand({
        Bucket: request.bucket,
        Key: request.key,
      })
    );
  }
}

export class SnsNotifier implements Notifier {
  constructor(
    private readonly snsClient: SNSClient,
    private readonly topicArn: string
  ) {}

  async publish(notification: Notification): Promise<void> {
    const response = await this.snsClient.send(
      new PublishCommand({
        TopicArn: this.topicArn,
        Subject: notification.subject,
        Message: notification.message,
      })
    );

    console.log('Notification published', { messageId: response.MessageId });
  }
}
