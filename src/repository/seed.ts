import { readFile } from 'fs/promises';
import { masterDataSchema, validateInput } from '../middleware/validation';
import { DatabaseError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { MasterDataSummary, ScheduleRepository } from './schedule_repository';

/** Loads products, lines and orders from a JSON file into the repository. */
export async function seedFromFile(repository: ScheduleRepository, path: string): Promise<MasterDataSummary> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new DatabaseError(
      `Failed to read seed file ${path}: ${errorMessage(error)}`,
      'seed',
      error instanceof Error ? error : undefined
    );
  }

  const data = validateInput(masterDataSchema, raw);
  const summary = await repository.upsertMasterData(data);
  logger.info('Seed data loaded', { path, ...summary });
  return summary;
}
