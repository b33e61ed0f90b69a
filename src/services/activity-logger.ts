import { queryOne, Queryable } from '../db';

interface LogParams {
  agent_name: string;
  action: string;
  input_summary?: string;
  output_summary?: string;
  success?: boolean;
  error_message?: string;
  metadata?: Record<string, unknown>;
}

export async function logAgentAction(db: Queryable, params: LogParams): Promise<{ id: number }> {
  const row = await queryOne<{ id: number }>(
    db,
    `INSERT INTO agent_logs (agent_name, action, input_summary, output_summary, success, error_message, metadata)
     VALUES ($1, $2, $3, $4, $5, $6, $7)
     RETURNING id`,
    [
      params.agent_name,
      params.action,
      params.input_summary ?? null,
      params.output_summary ?? null,
      params.success ?? true,
      params.error_message ?? null,
      JSON.stringify(params.metadata ?? {}),
    ]
  );

  if (!row) throw new Error('Failed to write agent log');
  return row;
}

export async function createBenchmark(
  db: Queryable,
  phase: string,
  description: string,
  status: 'started' | 'in_progress' | 'failed'
): Promise<{ id: number }> {
  const row = await queryOne<{ id: number }>(
    db,
    `INSERT INTO benchmarks (phase, description, status)
     VALUES ($1, $2, $3)
     RETURNING id`,
    [phase, description, status]
  );

  if (!row) throw new Error('Failed to create benchmark');
  return row;
}

/** Completes the most recent open benchmark for a phase; null when none is open. */
export async function completeBenchmark(
  db: Queryable,
  phase: string,
  notes: string
): Promise<{ id: number } | null> {
  return queryOne<{ id: number }>(
    db,
    `UPDATE benchmarks SET status = 'completed', notes = $2, completed_at = NOW()
     WHERE id = (
       SELECT id FROM benchmarks
       WHERE phase = $1 AND status <> 'completed'
       ORDER BY started_at DESC LIMIT 1
     )
     RETURNING id`,
    [phase, notes]
  );
}
