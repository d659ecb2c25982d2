import { EventBridgeEvent } from 'aws-lambda';

import { Notifier, ObjectStore } from './clients';
import { QuarantineConfig } from './config';
import { MAX_SUBJECT_LENGTH, QUARANTINE_TAG } from './constants';
import { QuarantineStep, QuarantineStepError } from './errors';
import {
  Finding,
  MacieFindingDetail,
  ObjectReference,
  parseFinding,
} from './finding';

export type MacieFindingEvent = EventBridgeEvent<
  'Macie Finding',
  MacieFindingDetail | undefined
>;

export interface QuarantineDetails {
  original_bucket: string;
  original_key: string;
  quarantine_key: string;
  severity: string;
}

export type QuarantineResult =
  | { status: 'quarantined'; details: QuarantineDetails }
  | { status: 'skipped' };

export interface QuarantineDependencies {
  objectStore: ObjectStore;
  notifier: Notifier;
}

/**
 * Builds an SNS subject: printable ASCII only, no line breaks, at most
 * 100 characters.
 */
export function buildSubject(finding: Finding): string {
  const subject = `Macie ${finding.severity} finding: ${finding.title}`
    .replace(/[^\x20-\x7E]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  return subject.length > MAX_SUBJECT_LENGTH
    ? `${subject.slice(0, MAX_SUBJECT_LENGTH - 3)}...`
    : subject;
}

export class QuarantineHandler {
  constructor(
    private readonly deps: QuarantineDependencies,
    private readonly config: QuarantineConfig
  ) {}

  async handle(
    event: Pick<MacieFindingEvent, 'detail'>
  ): Promise<QuarantineResult> {
    const finding = parseFinding(event.detail);

    if (!finding.affectedResource) {
      console.log('Finding has no object-level resource, skipping', {
        title: finding.title,
        severity: finding.severity,
        findingType: finding.findingType,
      });
      return { status: 'skipped' };
    }

    const original = finding.affectedResource;
    const quarantine: ObjectReference = {
      bucket: this.config.quarantineStoreId,
      key: `${this.config.quarantinePrefix}${original.key}`,
    };

    await this.step('copy', () =>
      this.deps.objectStore.copyObject({
        sourceBucket: original.bucket,
        sourceKey: original.key,
        destinationBucket: quarantine.bucket,
        destinationKey: quarantine.key,
        metadata: {
          findingType: finding.findingType,
          severity: finding.severity,
        },
      })
    );
    console.log(
      `Copied s3://${original.bucket}/${original.key} to s3://${quarantine.bucket}/${quarantine.key}`
    );

    await this.step('tag', () =>
      this.deps.objectStore.tagObject({
        bucket: original.bucket,
        key: original.key,
        tags: [{ ...QUARANTINE_TAG }],
      })
    );
    console.log(`Tagged s3://${original.bucket}/${original.key}`);

    await this.step('publish', () =>
      this.deps.notifier.publish({
        subject: buildSubject(finding),
        message: JSON.stringify(
          {
            title: finding.title,
            severity: finding.severity,
            finding_type: finding.findingType,
            finding_id: finding.id,
            original_bucket: original.bucket,
            original_key: original.key,
            quarantine_bucket: quarantine.bucket,
            quarantine_key: quarantine.key,
            delete_original: this.config.deleteOriginal,
          },
          null,
          2
        ),
      })
    );

    // last, so a failed publish leaves the source in place for the retry
    if (this.config.deleteOriginal) {
      await this.step('delete', () =>
        this.deps.objectStore.deleteObject(original)
      );
      console.log(`Deleted s3://${original.bucket}/${original.key}`);
    }

    return {
      status: 'quarantined',
      details: {
        original_bucket: original.bucket,
        original_key: original.key,
        quarantine_key: quarantine.key,
        severity: finding.severity,
      },
    };
  }

  private async step(
    step: QuarantineStep,
    action: () => Promise<void>
  ): Promise<void> {
    try {
      await action();
    } catch (error) {
      console.error(`Error during quarantine step ${step}:`, error);
      throw new QuarantineStepError(
        step,
        error instanceof Error ? error.message : String(error),
        error
      );
    }
  }
}
