import { S3EventRecord, SQSRecord } from 'aws-lambda';

export interface ObjectDetails {
  buckets: string[];
  keys: string[];
}

// S3 event notifications form-encode object keys
export function getObjectKey(record: S3EventRecord): string {
  return decodeURIComponent(record.s3.object.key.replace(/\+/g, ' '));
}

/**
 * Reducer collecting the distinct buckets and object keys of S3 notifications
 * delivered through SQS. Bodies without `Records` (the `s3:TestEvent` sent
 * when the notification is configured) add nothing.
 */
export function collateObjectDetails(
  acc: ObjectDetails,
  record: SQSRecord
): ObjectDetails {
  const body = JSON.parse(record.body) as { Records?: S3EventRecord[] };
  const s3Records = body.Records ?? [];

  const buckets = [...acc.buckets, ...s3Records.map((r) => r.s3.bucket.name)];
  const keys = [...acc.keys, ...s3Records.map(getObjectKey)];

  return {
    buckets: Array.from(new Set(buckets)),
    keys: Array.from(new Set(keys)),
  };
}
