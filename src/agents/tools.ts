/**
 * Tools the agents can call during a model turn. Every handler takes the raw
 * tool input from the model, reads its arguments defensively and returns a
 * JSON-serialisable result.
 */

import type { Database, SqlParam } from '../db';
import { logAgentAction, createBenchmark, completeBenchmark } from '../services/activity-logger';
import {
  checkConnection,
  executeSafeSelect,
  getChords,
  getGuitarHistoryByCategory,
  getScalesForChord,
  HistoryCategory,
  searchChords,
  searchGuitarHistory,
  searchJazzStandards,
  searchScales,
  searchTechniques,
} from '../services/music-queries';
import { ensureLimit, formatResults, ResultFormat, validateSelectSql } from '../services/sql-guard';
import type { LlmToolDefinition } from '../services/claude';
import { AGENT_IDS, AgentId, JsonRecord } from './types';

export interface AgentTool {
  name: string;
  description: string;
  inputSchema: LlmToolDefinition['input_schema'];
  handler: (input: JsonRecord) => Promise<unknown>;
}

export interface ToolDeps {
  /** Null when no database is configured; data tools then report it. */
  db: Database | null;
  knowledgeBase: string | null;
}

export function toToolDefinition(tool: AgentTool): LlmToolDefinition {
  return {
    name: tool.name,
    description: tool.description,
    input_schema: tool.inputSchema,
  };
}

function str(input: JsonRecord, key: string): string | undefined {
  const value = input[key];
  return typeof value === 'string' ? value : undefined;
}

function requireStr(input: JsonRecord, key: string): string {
  const value = str(input, key);
  if (value === undefined || value.trim() === '') {
    throw new Error(`Missing required argument: ${key}`);
  }
  return value;
}

function int(input: JsonRecord, key: string, fallback: number): number {
  const value = input[key];
  return typeof value === 'number' && Number.isFinite(value) ? Math.trunc(value) : fallback;
}

function isSqlParam(value: unknown): value is SqlParam {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

const NO_DB = { results: [], note: 'Database not connected' };

const HISTORY_CATEGORIES: readonly string[] = ['luthier', 'instrument', 'innovation'];

function isHistoryCategory(value: string | undefined): value is HistoryCategory {
  return value !== undefined && HISTORY_CATEGORIES.includes(value);
}

// ---------------------------------------------------------------------------
// Luthier & historian
// ---------------------------------------------------------------------------

export function luthierTools({ db, knowledgeBase }: ToolDeps): AgentTool[] {
  return [
    {
      name: 'query_guitar_history',
      description: 'Search the guitar history database for entries about specific eras, luthiers, instruments, or innovations',
      inputSchema: {
        type: 'object',
        properties: {
          search_term: { type: 'string', description: "The topic to search for (e.g., 'D'Angelico', 'archtop', '1950s')" },
          category: { type: 'string', enum: ['luthier', 'instrument', 'innovation', 'all'], description: 'Category filter' },
        },
        required: ['search_term'],
      },
      handler: async (input) => {
        if (!db) return NO_DB;
        const category = str(input, 'category');
        const rows = isHistoryCategory(category)
          ? await getGuitarHistoryByCategory(db, category)
          : await searchGuitarHistory(db, requireStr(input, 'search_term'));
        return {
          results: rows.map((h) => ({
            title: h.title,
            era: h.era,
            category: h.category,
            content: h.content.substring(0, 500),
            summary: h.summary ?? '',
            key_figures: h.key_figures,
            instruments: h.instruments,
          })),
          count: rows.length,
        };
      },
    },
    {
      name: 'query_wood_types',
      description: 'Query the database for information about tonewoods used in guitar construction',
      inputSchema: {
        type: 'object',
        properties: {
          wood_name: { type: 'string', description: "Name of the wood (e.g., 'spruce', 'mahogany', 'rosewood')" },
        },
        required: ['wood_name'],
      },
      handler: async (input) => {
        if (!db) return NO_DB;
        const rows = await searchGuitarHistory(db, requireStr(input, 'wood_name'));
        return {
          results: rows.map((h) => ({
            title: h.title,
            era: h.era,
            content: h.content.substring(0, 500),
            materials: h.materials,
          })),
          count: rows.length,
        };
      },
    },
    {
      name: 'search_knowledge_base',
      description: 'Search the luthier knowledge base for detailed information on any guitar construction or history topic',
      inputSchema: {
        type: 'object',
        properties: { query: { type: 'string', description: 'The search query' } },
        required: ['query'],
      },
      handler: async (input) => {
        if (!knowledgeBase) return { results: [], total: 0 };
        const needle = requireStr(input, 'query').toLowerCase();
        const relevant = knowledgeBase.split('\n').filter((line) => line.toLowerCase().includes(needle));
        return { results: relevant.slice(0, 20), total: relevant.length };
      },
    },
  ];
}

// ---------------------------------------------------------------------------
// Jazz teacher
// ---------------------------------------------------------------------------

export function jazzTeacherTools({ db }: ToolDeps): AgentTool[] {
  return [
    {
      name: 'query_chords',
      description: 'Search the chord database by type, category, or difficulty',
      inputSchema: {
        type: 'object',
        properties: {
          search_term: { type: 'string', description: 'Chord name or type to search' },
          category: { type: 'string', description: 'Category: jazz, altered, basic, modern-jazz' },
          difficulty_max: { type: 'integer', description: 'Maximum difficulty (1-5)' },
        },
        required: ['search_term'],
      },
      handler: async (input) => {
        if (!db) return NO_DB;
        const category = str(input, 'category');
        const rows = category
          ? await getChords(db, { category, difficultyMax: int(input, 'difficulty_max', 5) })
          : await searchChords(db, requireStr(input, 'search_term'));
        return {
          results: rows.map((c) => ({
            name: c.name,
            formula: c.formula,
            category: c.category,
            description: c.description ?? '',
            difficulty: c.difficulty,
            intervals: c.intervals,
          })),
          count: rows.length,
        };
      },
    },
    {
      name: 'query_scales',
      description: 'Search the scale/mode database by name, type, or chord compatibility',
      inputSchema: {
        type: 'object',
        properties: {
          search_term: { type: 'string', description: 'Scale name or type to search' },
          chord_compatibility: { type: 'string', description: 'Find scales for this chord type' },
        },
        required: ['search_term'],
      },
      handler: async (input) => {
        if (!db) return NO_DB;
        const chord = str(input, 'chord_compatibility');
        const rows = chord
          ? await getScalesForChord(db, chord)
          : await searchScales(db, requireStr(input, 'search_term'));
        return {
          results: rows.map((s) => ({
            name: s.name,
            formula: s.formula,
            category: s.category,
            character: s.character ?? '',
            description: s.description ?? '',
            chord_compatibility: s.chord_compatibility,
            common_usage: s.common_usage ?? '',
            difficulty: s.difficulty,
          })),
          count: rows.length,
        };
      },
    },
    {
      name: 'query_jazz_standards',
      description: 'Search the jazz standards database by title, composer, or key',
      inputSchema: {
        type: 'object',
        properties: { search_term: { type: 'string', description: 'Song title, composer, or key' } },
        required: ['search_term'],
      },
      handler: async (input) => {
        if (!db) return NO_DB;
        const rows = await searchJazzStandards(db, requireStr(input, 'search_term'));
        return {
          results: rows.map((s) => ({
            title: s.title,
            composer: s.composer,
            key: s.key,
            form: s.form,
            analysis: s.analysis ?? '',
            difficulty: s.difficulty,
          })),
          count: rows.length,
        };
      },
    },
    {
      name: 'query_techniques',
      description: 'Search the technique database for guitar techniques and practice methods',
      inputSchema: {
        type: 'object',
        properties: { search_term: { type: 'string', description: 'Technique name or category' } },
        required: ['search_term'],
      },
      handler: async (input) => {
        if (!db) return NO_DB;
        const rows = await searchTechniques(db, requireStr(input, 'search_term'));
        return { results: rows, count: rows.length };
      },
    },
    {
      name: 'generate_exercise',
      description: 'Generate a practice exercise for a specific topic and difficulty level',
      inputSchema: {
        type: 'object',
        properties: {
          topic: { type: 'string', description: 'Topic for the exercise' },
          difficulty: { type: 'integer', description: 'Difficulty 1-5' },
          skill_level: { type: 'string', enum: ['beginner', 'intermediate', 'advanced'] },
        },
        required: ['topic'],
      },
      handler: async (input) => ({
        tool: 'generate_exercise',
        topic: requireStr(input, 'topic'),
        difficulty: int(input, 'difficulty', 2),
        skill_level: str(input, 'skill_level') ?? 'intermediate',
      }),
    },
    {
      name: 'generate_quiz',
      description: 'Generate an interactive quiz on a music theory or guitar topic',
      inputSchema: {
        type: 'object',
        properties: {
          topic: { type: 'string', description: 'Quiz topic' },
          num_questions: { type: 'integer', description: 'Number of questions (3-10)' },
          difficulty: { type: 'integer', description: 'Difficulty 1-5' },
        },
        required: ['topic'],
      },
      handler: async (input) => ({
        tool: 'generate_quiz',
        topic: requireStr(input, 'topic'),
        num_questions: Math.min(10, Math.max(3, int(input, 'num_questions', 5))),
        difficulty: int(input, 'difficulty', 2),
      }),
    },
  ];
}

// ---------------------------------------------------------------------------
// SQL expert
// ---------------------------------------------------------------------------

const TABLE_SCHEMAS: Record<string, JsonRecord> = {
  chords: {
    columns: ['name TEXT', 'root TEXT', 'chord_type TEXT', 'formula TEXT', 'intervals JSONB', 'notes_in_c TEXT', 'category TEXT', 'voicings JSONB', 'description TEXT', 'difficulty INTEGER'],
    notes: 'Category values: jazz, altered, basic, modern-jazz',
  },
  scales: {
    columns: ['name TEXT', 'scale_type TEXT', 'parent_scale TEXT', 'formula TEXT', 'intervals JSONB', 'category TEXT', 'chord_compatibility JSONB', 'description TEXT', 'character TEXT', 'common_usage TEXT', 'difficulty INTEGER'],
    notes: 'Categories: major_modes, melodic_minor_modes, symmetric, bebop, pentatonic',
  },
  techniques: {
    columns: ['name TEXT', 'category TEXT', 'description TEXT', 'instructions TEXT', 'tips JSONB', 'exercises JSONB', 'difficulty INTEGER'],
  },
  jazz_standards: {
    columns: ['title TEXT', 'composer TEXT', 'year INTEGER', 'key TEXT', 'form TEXT', 'changes JSONB', 'analysis TEXT', 'difficulty INTEGER'],
    notes: 'changes is an object keyed by section (A1, A2, B, C)',
  },
  guitar_history: {
    columns: ['title TEXT', 'era TEXT', 'category TEXT', 'content TEXT', 'summary TEXT', 'key_figures JSONB', 'instruments JSONB', 'materials JSONB'],
  },
};

function isRowArray(value: unknown): value is JsonRecord[] {
  return Array.isArray(value) && value.every((row) => typeof row === 'object' && row !== null && !Array.isArray(row));
}

export function sqlExpertTools({ db }: ToolDeps): AgentTool[] {
  return [
    {
      name: 'execute_query',
      description: 'Execute a validated SELECT query against the database and return results',
      inputSchema: {
        type: 'object',
        properties: {
          sql: { type: 'string', description: 'The SQL SELECT query to execute, using $1, $2 placeholders' },
          params: { type: 'array', description: 'Positional query parameters', items: {} },
        },
        required: ['sql'],
      },
      handler: async (input) => {
        const sql = requireStr(input, 'sql');
        const validation = validateSelectSql(sql);
        if (!validation.isValid) return { error: validation.reason, results: [] };
        if (!db) return { error: 'Database not connected', results: [] };

        const rawParams = Array.isArray(input.params) ? input.params : [];
        if (!rawParams.every(isSqlParam)) return { error: 'Parameters must be scalars', results: [] };

        const statement = ensureLimit(sql);
        const results = await executeSafeSelect(db, statement, rawParams);
        return { results, count: results.length, sql: statement };
      },
    },
    {
      name: 'get_schema',
      description: 'Get the schema (column names and types) for a specific database table',
      inputSchema: {
        type: 'object',
        properties: {
          table_name: { type: 'string', description: 'Name of the table to inspect', enum: Object.keys(TABLE_SCHEMAS) },
        },
        required: ['table_name'],
      },
      handler: async (input) => {
        const table = requireStr(input, 'table_name');
        return TABLE_SCHEMAS[table] ?? { error: `Schema not found for '${table}'` };
      },
    },
    {
      name: 'validate_sql',
      description: 'Validate a SQL query for safety (injection prevention) and correctness',
      inputSchema: {
        type: 'object',
        properties: { sql: { type: 'string', description: 'The SQL query to validate' } },
        required: ['sql'],
      },
      handler: async (input) => {
        const { isValid, reason } = validateSelectSql(requireStr(input, 'sql'));
        return { is_valid: isValid, reason };
      },
    },
    {
      name: 'format_results',
      description: 'Format raw query results into a readable table or summary',
      inputSchema: {
        type: 'object',
        properties: {
          results: { type: 'array', description: 'Array of result rows' },
          format: { type: 'string', enum: ['table', 'list', 'summary'], description: 'Output format' },
        },
        required: ['results'],
      },
      handler: async (input) => {
        if (!isRowArray(input.results)) return { error: 'results must be an array of row objects' };
        const format = str(input, 'format');
        const resolved: ResultFormat = format === 'list' || format === 'summary' ? format : 'table';
        return formatResults(input.results, resolved);
      },
    },
  ];
}

// ---------------------------------------------------------------------------
// Dev / PM
// ---------------------------------------------------------------------------

export function devPmTools({ db }: ToolDeps, agentNames: readonly AgentId[] = AGENT_IDS): AgentTool[] {
  return [
    {
      name: 'log_benchmark',
      description: 'Log a development benchmark (phase completion, milestone reached)',
      inputSchema: {
        type: 'object',
        properties: {
          phase: { type: 'string', description: 'Development phase name' },
          description: { type: 'string', description: 'What was accomplished' },
          status: { type: 'string', enum: ['started', 'in_progress', 'completed', 'failed'] },
          notes: { type: 'string', description: 'Additional notes' },
        },
        required: ['phase', 'description', 'status'],
      },
      handler: async (input) => {
        const phase = requireStr(input, 'phase');
        const description = requireStr(input, 'description');
        const status = str(input, 'status');
        if (!db) return { status: 'no_db', phase, description };

        if (status === 'completed') {
          const notes = str(input, 'notes') ?? '';
          const benchmark = await completeBenchmark(db, phase, notes);
          return { status: 'completed', phase, notes, found: benchmark !== null };
        }
        const benchmark = await createBenchmark(
          db,
          phase,
          description,
          status === 'started' || status === 'failed' ? status : 'in_progress'
        );
        return { status: 'created', phase, id: benchmark.id };
      },
    },
    {
      name: 'log_error',
      description: 'Log an error with root cause analysis and solution',
      inputSchema: {
        type: 'object',
        properties: {
          error_id: { type: 'string', description: 'Unique error identifier' },
          phase: { type: 'string', description: 'Development phase' },
          problem: { type: 'string', description: 'Description of the problem' },
          root_cause: { type: 'string', description: 'Root cause analysis' },
          solution: { type: 'string', description: 'How it was fixed' },
          prevention: { type: 'string', description: 'How to prevent recurrence' },
          files_changed: { type: 'array', items: { type: 'string' }, description: 'Files that were modified' },
        },
        required: ['error_id', 'problem'],
      },
      handler: async (input) => {
        const errorId = requireStr(input, 'error_id');
        const problem = requireStr(input, 'problem');
        if (!db) return { status: 'no_db', error_id: errorId };

        const rootCause = str(input, 'root_cause') ?? '';
        const solution = str(input, 'solution') ?? '';
        const filesChanged = Array.isArray(input.files_changed)
          ? input.files_changed.filter((f): f is string => typeof f === 'string')
          : [];
        const log = await logAgentAction(db, {
          agent_name: 'dev_pm',
          action: 'log_error',
          input_summary: `[${errorId}] ${problem}`,
          output_summary: `Root cause: ${rootCause}. Solution: ${solution}`,
          success: false,
          error_message: problem,
          metadata: {
            error_id: errorId,
            phase: str(input, 'phase') ?? '',
            root_cause: rootCause,
            solution,
            prevention: str(input, 'prevention') ?? '',
            files_changed: filesChanged,
          },
        });
        return { status: 'logged', error_id: errorId, log_id: log.id };
      },
    },
    {
      name: 'generate_docs',
      description: 'Generate or update project documentation (changelog, benchmarks, debugging guide)',
      inputSchema: {
        type: 'object',
        properties: {
          doc_type: { type: 'string', enum: ['changelog', 'benchmarks', 'debugging', 'decisions'], description: 'Type of documentation to generate' },
          content: { type: 'string', description: 'Content to add' },
        },
        required: ['doc_type', 'content'],
      },
      handler: async (input) => ({
        doc_type: requireStr(input, 'doc_type'),
        content: requireStr(input, 'content'),
        status: 'generated',
      }),
    },
    {
      name: 'health_check',
      description: 'Check the health status of all system components',
      inputSchema: { type: 'object', properties: {} },
      handler: async () => ({
        database: db ? await checkConnection(db) : 'not_configured',
        agents: Object.fromEntries(agentNames.map((name) => [name, 'active'])),
        api: 'active',
      }),
    },
  ];
}
