import {
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectTaggingCommand,
  PutObjectTaggingCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';

import {
  copySource,
  mergeTags,
  S3ObjectStore,
  SnsNotifier,
} from '../src/clients';

describe('copySource', () => {
  it('URL-encodes the key', () => {
    expect(copySource('data-1', 'demo/q1 report.txt')).toBe(
      'data-1/demo%2Fq1%20report.txt'
    );
  });
});

describe('mergeTags', () => {
  it('overwrites tags with the same key and keeps the others', () => {
    expect(
      mergeTags(
        [
          { Key: 'owner', Value: 'data-team' },
          { Key: 'pii', Value: 'unknown' },
        ],
        [{ Key: 'pii', Value: 'quarantined' }]
      )
    ).toEqual([
      { Key: 'owner', Value: 'data-team' },
      { Key: 'pii', Value: 'quarantined' },
    ]);
  });

  it('does not duplicate a tag applied twice', () => {
    const tags = [{ Key: 'pii', Value: 'quarantined' }];

    expect(mergeTags(mergeTags([], tags), tags)).toEqual(tags);
  });
});

describe('S3ObjectStore', () => {
  const send = jest.fn();
  const store = new S3ObjectStore({ send } as unknown as S3Client);

  beforeEach(() => {
    send.mockReset();
    send.mockResolvedValue({});
  });

  it('copies with replaced metadata', async () => {
    await store.copyObject({
      sourceBucket: 'data-1',
      sourceKey: 'demo/pii.txt',
      destinationBucket: 'quarantine-bucket',
      destinationKey: 'quarantined/demo/pii.txt',
      metadata: { findingType: 'CREDENTIALS', severity: 'High' },
    });

    const [command] = send.mock.calls[0];
    expect(command).toBeInstanceOf(CopyObjectCommand);
    expect(command.input).toEqual({
      Bucket: 'quarantine-bucket',
      Key: 'quarantined/demo/pii.txt',
      CopySource: 'data-1/demo%2Fpii.txt',
      MetadataDirective: 'REPLACE',
      Metadata: { findingType: 'CREDENTIALS', severity: 'High' },
    });
  });

  it('tags an untagged object', async () => {
    await store.tagObject({
      bucket: 'data-1',
      key: 'demo/pii.txt',
      tags: [{ Key: 'pii', Value: 'quarantined' }],
    });

    const [getCommand] = send.mock.calls[0];
    expect(getCommand).toBeInstanceOf(GetObjectTaggingCommand);
    expect(getCommand.input).toEqual({ Bucket: 'data-1', Key: 'demo/pii.txt' });

    const [putCommand] = send.mock.calls[1];
    expect(putCommand).toBeInstanceOf(PutObjectTaggingCommand);
    expect(putCommand.input).toEqual({
      Bucket: 'data-1',
      Key: 'demo/pii.txt',
      Tagging: { TagSet: [{ Key: 'pii', Value: 'quarantined' }] },
    });
  });

  it('keeps the tags the object already carries', async () => {
    send.mockResolvedValueOnce({
      TagSet: [
        { Key: 'cost-center', Value: 'analytics' },
        { Key: 'pii', Value: 'unknown' },
      ],
    });

    await store.tagObject({
      bucket: 'data-1',
      key: 'demo/pii.txt',
      tags: [{ Key: 'pii', Value: 'quarantined' }],
    });

    const [putCommand] = send.mock.calls[1];
    expect(putCommand.input.Tagging).toEqual({
      TagSet: [
        { Key: 'cost-center', Value: 'analytics' },
        { Key: 'pii', Value: 'quarantined' },
      ],
    });
  });

  it('deletes the object', async () => {
    await store.deleteObject({ bucket: 'data-1', key: 'demo/pii.txt' });

    const [command] = send.mock.calls[0];
    expect(command).toBeInstanceOf(DeleteObjectCommand);
    expect(command.input).toEqual({ Bucket: 'data-1', Key: 'demo/pii.txt' });
  });

  it('propagates client errors', async () => {
    send.mockRejectedValue(new Error('Access Denied'));

    await expect(
      store.deleteObject({ bucket: 'data-1', key: 'demo/pii.txt' })
    ).rejects.toThrow('Access Denied');
  });
});

describe('SnsNotifier', () => {
  const topicArn = 'arn:aws:sns:eu-central-1:123456789012:findings';

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('publishes subject and message to the topic', async () => {
    const send = jest.fn().mockResolvedValue({ MessageId: 'message-1' });
    const notifier = new SnsNotifier({ send } as unknown as SNSClient, topicArn);

    await notifier.publish({ subject: 'Macie High finding', message: '{}' });

    const [command] = send.mock.calls[0];
    expect(command).toBeInstanceOf(PublishCommand);
    expect(command.input).toEqual({
      TopicArn: topicArn,
      Subject: 'Macie High finding',
      Message: '{}',
    });
  });

  it('propagates client errors', async () => {
    const send = jest.fn().mockRejectedValue(new Error('Throttling'));
    const notifier = new SnsNotifier({ send } as unknown as SNSClient, topicArn);

    await expect(
      notifier.publish({ subject: 'Macie High finding', message: '{}' })
    ).rejects.toThrow('Throttling');
  });
});
