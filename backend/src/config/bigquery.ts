import { BigQuery } from '@google-cloud/bigquery';
import { env } from './env';
import { createComponentLogger } from './logger';

const logger = createComponentLogger('bigquery');

export interface BigQueryConfig {
  projectId: string;
  datasetId: string;
  location: string;
  maxRows: number;
}

export const getBigQueryConfig = (): BigQueryConfig => ({
  projectId: env.GOOGLE_CLOUD_PROJECT,
  datasetId: env.BIGQUERY_DATASET_ID,
  location: env.BIGQUERY_LOCATION,
  maxRows: env.BIGQUERY_MAX_ROWS
});

let client: BigQuery | null = null;

/**
 * Lazily create the BigQuery client; credentials come from the environment
 */
export function getBigQueryClient(): BigQuery {
  if (client) {
    return client;
  }

  const { projectId, location } = getBigQueryConfig();
  logger.info('Initializing BigQuery client', { projectId: projectId || '(default)', location });

  client = new BigQuery({
    projectId: projectId || undefined,
    location
  });

  return client;
}
