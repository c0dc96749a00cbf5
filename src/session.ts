import {CategoryFetchError} from './errors';
import {SensorGroups} from './types/Constants';

/**
 * The connected controller session. Every call resolves to the current
 * snapshot of one group of records.
 */
export interface SessionClient {
  getDom(): Promise<unknown>;
  getSensor(category: string): Promise<unknown>;
  getSystem(): Promise<unknown>;
}

function request(session: SessionClient, category: string): Promise<unknown> {
  switch (category) {
    case 'domus':
      return session.getDom();
    case 'system':
      return session.getSystem();
    default:
      return session.getSensor(
        SensorGroups.get(category) ?? category.toUpperCase()
      );
  }
}

export async function fetchCategory(
  session: SessionClient,
  category: string
): Promise<unknown[]> {
  let snapshot: unknown;
  try {
    snapshot = await request(session, category);
  } catch (error) {
    throw new CategoryFetchError(category, error);
  }

  if (!Array.isArray(snapshot)) {
    throw new CategoryFetchError(category, 'snapshot is not a list');
  }
  return snapshot;
}
