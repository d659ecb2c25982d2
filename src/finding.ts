import {
  DEFAULT_FINDING_TYPE,
  DEFAULT_SEVERITY,
  DEFAULT_TITLE,
} from './constants';

// Subset of the Macie finding published to EventBridge as the event detail.
// Every field is optional: policy findings carry no s3Object at all.
export interface MacieFindingDetail {
  id?: string;
  title?: string;
  type?: string;
  severity?: {
    description?: string;
    score?: number;
  };
  resourcesAffected?: {
    s3Bucket?: {
      name?: string;
    };
    s3Object?: {
      bucketName?: string;
      key?: string;
    };
  };
}

export interface ObjectReference {
  bucket: string;
  key: string;
}

export interface Finding {
  id?: string;
  title: string;
  severity: string;
  findingType: string;
  // Absent for bucket-level findings
  affectedResource?: ObjectReference;
}

const present = (value: string | undefined): string | undefined =>
  value === undefined || value === '' ? undefined : value;

/**
 * Object keys may arrive percent-encoded (`demo%2Fpii.txt`). A key that is not
 * valid percent-encoding is returned as received.
 */
export function decodeObjectKey(key: string): string {
  try {
    return decodeURIComponent(key);
  } catch (error) {
    if (error instanceof URIError) {
      return key;
    }
    throw error;
  }
}

export function parseFinding(detail: MacieFindingDetail | undefined): Finding {
  const resources = detail?.resourcesAffected;
  const bucket =
    present(resources?.s3Object?.bucketName) ??
    present(resources?.s3Bucket?.name);
  const key = present(resources?.s3Object?.key);

  return {
    id: present(detail?.id),
    title: present(detail?.title) ?? DEFAULT_TITLE,
    severity: present(detail?.severity?.description) ?? DEFAULT_SEVERITY,
    findingType: present(detail?.type) ?? DEFAULT_FINDING_TYPE,
    affectedResource:
      bucket && key ? { bucket, key: decodeObjectKey(key) } : undefined,
  };
}
