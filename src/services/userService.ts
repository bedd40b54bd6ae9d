import { Repositories } from '../repositories/interfaces';
import logger from '../lib/logger';

export interface ForgottenUser {
  persistentIds: number;
  agreements: number;
}

/** Drops every pseudonym and agreement held for a user being removed. */
async function forgetUser(repositories: Repositories, userId: string): Promise<ForgottenUser> {
  const persistentIds = await repositories.persistentIds.deleteByUser(userId);
  const agreements = await repositories.agreements.deleteByUser(userId);
  logger.audit('User federation data removed', { userId, persistentIds, agreements });
  return { persistentIds, agreements };
}

export default {
  forgetUser
};
