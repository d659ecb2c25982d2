import { ManagedDataIdentifierSelector } from '@aws-sdk/client-macie2';

import {
  DEFAULT_MANAGED_DATA_IDENTIFIER_SELECTOR,
  QUARANTINE_PREFIX,
} from './constants';
import { ConfigurationError } from './errors';

export interface QuarantineConfig {
  quarantineStoreId: string;
  notificationTargetId: string;
  quarantinePrefix: string;
  // Off by default: the original object is only tagged
  deleteOriginal: boolean;
}

export interface DiscoveryJobConfig {
  customDataIdentifierIds: string[];
  managedDataIdentifierSelector: ManagedDataIdentifierSelector;
}

const isManagedDataIdentifierSelector = (
  value: string
): value is ManagedDataIdentifierSelector =>
  Object.values<string>(ManagedDataIdentifierSelector).includes(value);

export function loadQuarantineConfig(
  env: NodeJS.ProcessEnv = process.env
): QuarantineConfig {
  const { QUARANTINE_BUCKET, SNS_TOPIC_ARN, QUARANTINE_PREFIX: prefix } = env;

  if (!QUARANTINE_BUCKET || !SNS_TOPIC_ARN) {
    throw new ConfigurationError(
      'Mandatory environment variables are missing: QUARANTINE_BUCKET, SNS_TOPIC_ARN'
    );
  }

  return {
    quarantineStoreId: QUARANTINE_BUCKET,
    notificationTargetId: SNS_TOPIC_ARN,
    quarantinePrefix: prefix || QUARANTINE_PREFIX,
    deleteOriginal: env.DELETE_ORIGINAL?.trim().toLowerCase() === 'true',
  };
}

export function loadDiscoveryJobConfig(
  env: NodeJS.ProcessEnv = process.env
): DiscoveryJobConfig {
  const selector =
    env.MANAGED_DATA_IDENTIFIER_SELECTOR ||
    DEFAULT_MANAGED_DATA_IDENTIFIER_SELECTOR;

  if (!isManagedDataIdentifierSelector(selector)) {
    throw new ConfigurationError(
      `Unsupported managed data identifier selector: ${selector}`
    );
  }

  return {
    customDataIdentifierIds: (env.CUSTOM_DATA_IDENTIFIER_IDS ?? '')
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0),
    managedDataIdentifierSelector: selector,
  };
}
