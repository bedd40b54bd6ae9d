import { AgreementRecordRepository } from '../repositories/interfaces';
import { AgreementRecord } from '../types';
import { joinAttributeNames, splitAttributeNames } from '../lib/mapping';
import logger from '../lib/logger';

const HOUR_MS = 60 * 60 * 1000;

export interface ConsentConfig {
  /** Hours an agreement stays valid. Zero or less never expires. */
  validityHours: number;
}

export type ConsentStatus = 'fresh' | 'missing' | 'expired' | 'insufficient';

export interface ConsentDecision {
  status: ConsentStatus;
  record: AgreementRecord | null;
}

export function isExpired(
  record: Pick<AgreementRecord, 'created'>,
  validityHours: number,
  now: Date = new Date()
): boolean {
  if (!(validityHours > 0)) {
    return false;
  }
  return now.getTime() > record.created.getTime() + validityHours * HOUR_MS;
}

export function needsMoreConsent(record: Pick<AgreementRecord, 'attrs'>, requested: Iterable<string>): boolean {
  const agreed = splitAttributeNames(record.attrs);
  for (const name of requested) {
    if (!agreed.has(name)) return true;
  }
  return false;
}

export class ConsentTracker {
  constructor(
    private readonly agreements: AgreementRecordRepository,
    private readonly config: ConsentConfig,
    private readonly now: () => Date = () => new Date()
  ) {}

  async evaluate(userId: string, spEntityId: string, requested: Iterable<string>): Promise<ConsentDecision> {
    const record = await this.agreements.findLatest(userId, spEntityId);
    if (!record) {
      return { status: 'missing', record: null };
    }
    if (isExpired(record, this.config.validityHours, this.now())) {
      return { status: 'expired', record };
    }
    if (needsMoreConsent(record, requested)) {
      return { status: 'insufficient', record };
    }
    return { status: 'fresh', record };
  }

  async recordAgreement(userId: string, spEntityId: string, attrs: Iterable<string>): Promise<AgreementRecord> {
    const record = await this.agreements.append(userId, spEntityId, joinAttributeNames(attrs));
    logger.audit('User agreement recorded', { userId, sp: spEntityId, attrs: record.attrs });
    return record;
  }
}
