import { SQSEvent } from 'aws-lambda';
import {
  Macie2Client,
  CreateClassificationJobCommand,
  S3JobDefinition,
} from '@aws-sdk/client-macie2';

import { DiscoveryJobConfig, loadDiscoveryJobConfig } from './config';
import { collateObjectDetails } from './helpers';

const macieClient = new Macie2Client({ region: process.env.AWS_REGION });

export const NO_JOB_CREATED = 'No job created';

export const createDiscoveryJob = async (
  client: Macie2Client,
  config: DiscoveryJobConfig,
  event: SQSEvent
): Promise<string> => {
  if (!event.Records || event.Records.length === 0) {
    console.log('No records found in the event');
    return NO_JOB_CREATED;
  }

  const { buckets, keys } = event.Records.reduce(collateObjectDetails, {
    buckets: [],
    keys: [],
  });

  if (buckets.length === 0 || keys.length === 0) {
    console.log('No uploaded objects found in the records');
    return NO_JOB_CREATED;
  }

  const jobName = `macie-scan-${Date.now()}`;

  const s3JobDefinition: S3JobDefinition = {
    bucketDefinitions: [
      {
        accountId: event.Records[0].eventSourceARN.split(':')[4],
        buckets,
      },
    ],
    scoping: {
      includes: {
        and: [
          {
            simpleScopeTerm: {
              comparator: 'STARTS_WITH',
              key: 'OBJECT_KEY',
              values: keys,
            },
          },
        ],
      },
    },
  };

  const createJobCommand = new CreateClassificationJobCommand({
    name: jobName,
    jobType: 'ONE_TIME',
    s3JobDefinition,
    customDataIdentifierIds:
      config.customDataIdentifierIds.length > 0
        ? config.customDataIdentifierIds
        : undefined,
    managedDataIdentifierSelector: config.managedDataIdentifierSelector,
  });

  try {
    const response = await client.send(createJobCommand);

    console.log('Macie job created successfully:', {
      jobId: response.jobId,
      jobName,
      buckets,
      keys,
    });

    return response.jobId ?? 'No job id provided';
  } catch (error) {
    console.error('Error creating Macie classification job:', error);
    throw error;
  }
};

export const handler = async (event: SQSEvent): Promise<string> => {
  const config = loadDiscoveryJobConfig(process.env);

  console.log('EVENT', JSON.stringify(event, null, 2));

  return createDiscoveryJob(macieClient, config, event);
};
