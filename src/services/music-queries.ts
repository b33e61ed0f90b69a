/**
 * Typed, parameterised queries over the reference tables. Agent tools go
 * through these (or executeSafeSelect for validated ad-hoc SELECTs) and never
 * build SQL from user input.
 */

import { Database, query, Queryable, SqlParam, withReadOnlyTransaction } from '../db';
import { errorMessage } from '../utils';

export type Chord = {
  name: string;
  formula: string;
  category: string;
  description: string | null;
  difficulty: number;
  intervals: string[];
};

export type Scale = {
  name: string;
  formula: string;
  category: string;
  character: string | null;
  description: string | null;
  chord_compatibility: string[];
  common_usage: string | null;
  difficulty: number;
};

export type Technique = {
  name: string;
  category: string;
  description: string;
  instructions: string | null;
  tips: string[];
  exercises: string[];
  difficulty: number;
};

export type JazzStandard = {
  title: string;
  composer: string;
  key: string;
  form: string | null;
  analysis: string | null;
  difficulty: number;
};

export type GuitarHistoryEntry = {
  title: string;
  era: string | null;
  category: string;
  content: string;
  summary: string | null;
  key_figures: string[];
  instruments: string[];
  materials: string[];
};

export type HistoryCategory = 'luthier' | 'instrument' | 'innovation';

const like = (term: string): string => `%${term}%`;

export async function getChords(
  db: Queryable,
  filters: { category?: string; difficultyMin?: number; difficultyMax?: number; limit?: number } = {}
): Promise<Chord[]> {
  const params: SqlParam[] = [filters.difficultyMin ?? 1, filters.difficultyMax ?? 5];
  let where = 'is_active AND difficulty BETWEEN $1 AND $2';
  if (filters.category) {
    params.push(filters.category);
    where += ` AND category = $${params.length}`;
  }
  params.push(filters.limit ?? 50);
  return query<Chord>(
    db,
    `SELECT name, formula, category, description, difficulty, intervals
     FROM chords WHERE ${where}
     ORDER BY difficulty, name LIMIT $${params.length}`,
    params
  );
}

export async function searchChords(db: Queryable, searchTerm: string, limit = 20): Promise<Chord[]> {
  return query<Chord>(
    db,
    `SELECT name, formula, category, description, difficulty, intervals
     FROM chords
     WHERE is_active AND (name ILIKE $1 OR description ILIKE $1 OR formula ILIKE $1)
     LIMIT $2`,
    [like(searchTerm), limit]
  );
}

export async function searchScales(db: Queryable, searchTerm: string, limit = 20): Promise<Scale[]> {
  return query<Scale>(
    db,
    `SELECT name, formula, category, character, description, chord_compatibility, common_usage, difficulty
     FROM scales
     WHERE is_active AND (name ILIKE $1 OR description ILIKE $1 OR character ILIKE $1)
     LIMIT $2`,
    [like(searchTerm), limit]
  );
}

export async function getScalesForChord(db: Queryable, chordName: string, limit = 20): Promise<Scale[]> {
  return query<Scale>(
    db,
    `SELECT name, formula, category, character, description, chord_compatibility, common_usage, difficulty
     FROM scales
     WHERE is_active AND chord_compatibility::text ILIKE $1
     ORDER BY difficulty, name LIMIT $2`,
    [like(chordName), limit]
  );
}

export async function searchTechniques(db: Queryable, searchTerm: string, limit = 20): Promise<Technique[]> {
  return query<Technique>(
    db,
    `SELECT name, category, description, instructions, tips, exercises, difficulty
     FROM techniques
     WHERE is_active AND (name ILIKE $1 OR description ILIKE $1 OR category ILIKE $1)
     LIMIT $2`,
    [like(searchTerm), limit]
  );
}

export async function searchJazzStandards(db: Queryable, searchTerm: string, limit = 20): Promise<JazzStandard[]> {
  return query<JazzStandard>(
    db,
    `SELECT title, composer, key, form, analysis, difficulty
     FROM jazz_standards
     WHERE title ILIKE $1 OR composer ILIKE $1 OR key = $2
     ORDER BY title LIMIT $3`,
    [like(searchTerm), searchTerm, limit]
  );
}

export async function searchGuitarHistory(db: Queryable, searchTerm: string, limit = 20): Promise<GuitarHistoryEntry[]> {
  return query<GuitarHistoryEntry>(
    db,
    `SELECT title, era, category, content, summary, key_figures, instruments, materials
     FROM guitar_history
     WHERE title ILIKE $1 OR content ILIKE $1 OR key_figures::text ILIKE $1 OR materials::text ILIKE $1
     LIMIT $2`,
    [like(searchTerm), limit]
  );
}

export async function getGuitarHistoryByCategory(
  db: Queryable,
  category: HistoryCategory,
  limit = 20
): Promise<GuitarHistoryEntry[]> {
  return query<GuitarHistoryEntry>(
    db,
    `SELECT title, era, category, content, summary, key_figures, instruments, materials
     FROM guitar_history WHERE category = $1
     ORDER BY era NULLS LAST, title LIMIT $2`,
    [category, limit]
  );
}

export const SAFE_SELECT_TIMEOUT_MS = 5000;

/**
 * Runs a statement that has already passed validateSelectSql. The database
 * still enforces read-only access and the timeout.
 */
export async function executeSafeSelect(
  db: Database,
  sql: string,
  params: SqlParam[] = []
): Promise<Record<string, unknown>[]> {
  return withReadOnlyTransaction(db, SAFE_SELECT_TIMEOUT_MS, (client) =>
    query<Record<string, unknown>>(client, sql, params)
  );
}

export async function checkConnection(db: Queryable): Promise<'connected' | 'error'> {
  try {
    await db.query('SELECT 1');
    return 'connected';
  } catch (err) {
    console.error('[DB] Health check failed:', errorMessage(err));
    return 'error';
  }
}
