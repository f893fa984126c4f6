import {Request, Response} from 'express';
import {AppDependencies} from '../interfaces/dependencies';

export const DATABASE_STATUS = {
  notAvailable: '❌ Not Available',
  notInitialized: '⚠️  Available but not initialized',
  available: '✅ Available',
  working: '✅ Connected & Working',
} as const;

const MAX_COLLECTIONS = 10;
const MAX_ERROR_LENGTH = 50;

export interface DatabaseTestReport {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

function short_message(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  return message.slice(0, MAX_ERROR_LENGTH);
}

export function read_root(_: Request, res: Response) {
  res.status(200).json({message: 'Hello from the Backend!'});
}

export function say_hello(_: Request, res: Response) {
  res.status(200).json({message: 'Hello from the backend API!'});
}

export function test_database({
  config,
  database,
}: Pick<AppDependencies, 'config' | 'database'>) {
  return async function (_: Request, res: Response) {
    const report: DatabaseTestReport = {
      backend: '✅ Running',
      database: DATABASE_STATUS.notAvailable,
      database_url: config.databaseUrl ? '✅ Set' : '❌ Not Set',
      database_name: config.databaseName ? '✅ Set' : '❌ Not Set',
      connection_status: 'Not Connected',
      collections: [],
    };

    // this route reports failures in the body and always answers 200
    if (database === null) {
      report.database = DATABASE_STATUS.notInitialized;
    } else {
      report.database = DATABASE_STATUS.available;
      report.connection_status = 'Connected';

      try {
        const collections = await database.list_collection_names();
        report.collections = collections.slice(0, MAX_COLLECTIONS);
        report.database = DATABASE_STATUS.working;
      } catch (error) {
        report.database = `⚠️  Connected but Error: ${short_message(error)}`;
      }
    }

    res.status(200).json(report);
  };
}
