import { Pool } from 'pg';
import { errorMessage } from '../errors';
import { createLogger } from './logger';

const log = createLogger('worker');

export interface WorkerOutcome {
  success?: boolean;
  items_processed?: number;
}

/**
 * Runs a maintenance job and records it in worker_runs. A failing job is
 * marked failed and logged; the error does not escape.
 */
export async function runWorker(
  pool: Pool,
  workerName: string,
  workerFn: () => Promise<WorkerOutcome>
): Promise<void> {
  const startTime = Date.now();
  log.info({ worker: workerName }, 'Starting worker');

  const { rows } = await pool.query<{ id: number }>(
    `INSERT INTO worker_runs (worker_name, started_at, status)
     VALUES ($1, NOW(), 'running')
     RETURNING id`,
    [workerName]
  );
  const runId = rows[0].id;

  try {
    const result = await workerFn();
    const duration = (Date.now() - startTime) / 1000;
    const success = result.success !== false;

    await pool.query(
      `UPDATE worker_runs
       SET completed_at = NOW(),
           status = $2,
           items_processed = COALESCE($3, 0),
           duration_seconds = $4,
           success = $5
       WHERE id = $1`,
      [runId, success ? 'success' : 'partial', result.items_processed, duration, success]
    );

    log.info({ worker: workerName, duration, items: result.items_processed ?? 0 }, 'Worker finished');
  } catch (err) {
    const duration = (Date.now() - startTime) / 1000;
    log.error({ worker: workerName, err: errorMessage(err) }, 'Worker failed');

    await pool.query(
      `UPDATE worker_runs
       SET completed_at = NOW(),
           status = 'failed',
           duration_seconds = $2,
           success = false,
           error_message = $3
       WHERE id = $1`,
      [runId, duration, errorMessage(err)]
    );
  }
}
