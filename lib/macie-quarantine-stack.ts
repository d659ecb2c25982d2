import * as path from 'path';
import * as cdk from 'aws-cdk-lib';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as nodejsLambda from 'aws-cdk-lib/aws-lambda-nodejs';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as s3EventNotifications from 'aws-cdk-lib/aws-s3-notifications';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as macie from 'aws-cdk-lib/aws-macie';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as snsSubscriptions from 'aws-cdk-lib/aws-sns-subscriptions';
import * as sqs from 'aws-cdk-lib/aws-sqs';
import * as lambdaEventSources from 'aws-cdk-lib/aws-lambda-event-sources';
import { Construct } from 'constructs';

import { ACTIONABLE_SEVERITIES, QUARANTINE_PREFIX } from '../src/constants';

const lambdaFnProps: Partial<nodejsLambda.NodejsFunctionProps> = {
  bundling: {
    target: 'es2022',
    logLevel: nodejsLambda.LogLevel.INFO,
    minify: true,
    sourceMap: true,
  },
  runtime: lambda.Runtime.NODEJS_20_X,
  timeout: cdk.Duration.seconds(10),
  memorySize: 128,
  logRetention: logs.RetentionDays.ONE_WEEK,
  environment: {
    NODE_OPTIONS: '--enable-source-maps',
  },
};

export interface MacieQuarantineStackProps extends cdk.StackProps {
  /**
   * Email address subscribed to the finding notifications.
   * The subscription has to be confirmed from the mailbox.
   */
  readonly notificationEmail?: string;

  /**
   * Delete the original object once it has been quarantined.
   * @default false
   */
  readonly deleteOriginal?: boolean;

  /**
   * Enable Macie in the account. Turn off when Macie is already enabled.
   * @default true
   */
  readonly enableMacieSession?: boolean;
}

export class MacieQuarantineStack extends cdk.Stack {
  public readonly scannedBucket: s3.Bucket;
  public readonly quarantineBucket: s3.Bucket;
  public readonly notificationTopic: sns.Topic;
  public readonly quarantineFn: nodejsLambda.NodejsFunction;

  constructor(
    scope: Construct,
    id: string,
    props: MacieQuarantineStackProps = {}
  ) {
    super(scope, id, props);

    const deleteOriginal = props.deleteOriginal ?? false;

    this.scannedBucket = new s3.Bucket(this, 'ScannedBucket', {
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
    });

    // kept apart from the scanned bucket so copies are never scanned again
    this.quarantineBucket = new s3.Bucket(this, 'QuarantineBucket', {
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      versioned: true,
    });

    if (props.enableMacieSession ?? true) {
      new macie.CfnSession(this, 'MacieSession', {
        status: 'ENABLED',
        findingPublishingFrequency: 'FIFTEEN_MINUTES',
      });
    }

    this.notificationTopic = new sns.Topic(this, 'FindingNotificationTopic', {
      displayName: 'Macie PII quarantine notifications',
    });
    if (props.notificationEmail) {
      this.notificationTopic.addSubscription(
        new snsSubscriptions.EmailSubscription(props.notificationEmail)
      );
    }

    // create a queue with a DLQ for error processing and avoiding loops
    const uploadQueue = new sqs.Queue(this, 'UploadEventQueue', {
      visibilityTimeout: cdk.Duration.seconds(60),
      deadLetterQueue: {
        queue: new sqs.Queue(this, 'UploadEventDeadLetterQueue', {
          retentionPeriod: cdk.Duration.days(14),
        }),
        maxReceiveCount: 3,
      },
    });
    this.scannedBucket.addEventNotification(
      s3.EventType.OBJECT_CREATED,
      new s3EventNotifications.SqsDestination(uploadQueue)
    );

    // create a Macie classification job for every batch of uploads
    const createMacieJobFn = new nodejsLambda.NodejsFunction(
      this,
      'CreateMacieJobFn',
      {
        ...lambdaFnProps,
        entry: path.join(__dirname, '../src/macie-discovery-job.ts'),
        handler: 'handler',
      }
    );
    createMacieJobFn.addToRolePolicy(
      new iam.PolicyStatement({
        actions: [
          'macie2:CreateClassificationJob',
          'macie2:ListClassificationJobs',
        ],
        resources: [
          `arn:aws:macie2:${this.region}:${this.account}:classification-job/*`,
        ],
      })
    );
    createMacieJobFn.addEventSource(
      new lambdaEventSources.SqsEventSource(uploadQueue, {
        batchSize: 10,
        maxBatchingWindow: cdk.Duration.seconds(5),
      })
    );

    // quarantine objects Macie reports sensitive data in
    this.quarantineFn = new nodejsLambda.NodejsFunction(this, 'QuarantineFn', {
      ...lambdaFnProps,
      entry: path.join(__dirname, '../src/quarantine-handler.ts'),
      handler: 'handler',
      // server-side copies of large objects outlast the shared timeout
      timeout: cdk.Duration.minutes(5),
      environment: {
        ...lambdaFnProps.environment,
        QUARANTINE_BUCKET: this.quarantineBucket.bucketName,
        SNS_TOPIC_ARN: this.notificationTopic.topicArn,
        QUARANTINE_PREFIX,
        DELETE_ORIGINAL: String(deleteOriginal),
      },
    });
    this.scannedBucket.grantRead(this.quarantineFn);
    this.quarantineFn.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['s3:PutObjectTagging'],
        resources: [this.scannedBucket.arnForObjects('*')],
      })
    );
    if (deleteOriginal) {
      this.scannedBucket.grantDelete(this.quarantineFn);
    }
    this.quarantineBucket.grantPut(this.quarantineFn);
    this.notificationTopic.grantPublish(this.quarantineFn);

    // eventbridge rule on actionable macie findings
    new events.Rule(this, 'MacieFindingsRule', {
      eventPattern: {
        source: ['aws.macie'],
        detailType: ['Macie Finding'],
        detail: {
          severity: {
            description: ACTIONABLE_SEVERITIES,
          },
        },
      },
      targets: [
        new targets.LambdaFunction(this.quarantineFn, {
          retryAttempts: 2,
          deadLetterQueue: new sqs.Queue(this, 'FindingDeadLetterQueue', {
            retentionPeriod: cdk.Duration.days(14),
          }),
        }),
      ],
    });

    new cdk.CfnOutput(this, 'ScannedBucketName', {
      value: this.scannedBucket.bucketName,
    });
    new cdk.CfnOutput(this, 'QuarantineBucketName', {
      value: this.quarantineBucket.bucketName,
    });
    new cdk.CfnOutput(this, 'NotificationTopicArn', {
      value: this.notificationTopic.topicArn,
    });
  }
}
