export const QUARANTINE_PREFIX = 'quarantined/';

export const QUARANTINE_TAG = { Key: 'pii', Value: 'quarantined' } as const;

export const DEFAULT_TITLE = 'Macie Finding';
export const DEFAULT_SEVERITY = 'Unknown';
export const DEFAULT_FINDING_TYPE = 'UnknownType';

// Severities forwarded to the quarantine function by the EventBridge rule
export const ACTIONABLE_SEVERITIES = ['Medium', 'High'];

// SNS rejects longer subjects
export const MAX_SUBJECT_LENGTH = 100;

export const DEFAULT_MANAGED_DATA_IDENTIFIER_SELECTOR = 'RECOMMENDED';
