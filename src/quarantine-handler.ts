import { S3Client } from '@aws-sdk/client-s3';
import { SNSClient } from '@aws-sdk/client-sns';

import { S3ObjectStore, SnsNotifier } from './clients';
import { loadQuarantineConfig } from './config';
import {
  MacieFindingEvent,
  QuarantineHandler,
  QuarantineResult,
} from './quarantine';

const s3Client = new S3Client({ region: process.env.AWS_REGION });
const snsClient = new SNSClient({ region: process.env.AWS_REGION });

export const handler = async (
  event: MacieFindingEvent
): Promise<QuarantineResult> => {
  const config = loadQuarantineConfig(process.env);

  console.log('EVENT', JSON.stringify(event, null, 2));

  const quarantineHandler = new QuarantineHandler(
    {
      objectStore: new S3ObjectStore(s3Client),
      notifier: new SnsNotifier(snsClient, config.notificationTargetId),
    },
    config
  );

  const result = await quarantineHandler.handle(event);
  console.log('Quarantine result', JSON.stringify(result));

  return result;
};
