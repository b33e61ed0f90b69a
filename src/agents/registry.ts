import * as fs from 'fs';
import * as path from 'path';
import type { AppConfig } from '../config';
import type { Database } from '../db';
import type { LlmClient } from '../services/claude';
import { AgentSettings, LlmAgent, SuggestionRule } from './executor';
import { AgentTool, devPmTools, jazzTeacherTools, luthierTools, sqlExpertTools, ToolDeps } from './tools';
import { AGENT_IDS, AgentCapability, AgentId } from './types';

import { luthierHistorianPrompt } from './prompts/luthier-historian';
import { jazzTeacherPrompt } from './prompts/jazz-teacher';
import { sqlExpertPrompt } from './prompts/sql-expert';
import { devPmPrompt } from './prompts/dev-pm';

export interface AgentDefinition {
  name: AgentId;
  role: string;
  displayName: string;
  description: string;
  exampleQueries: readonly string[];
  temperature: number;
  maxTokens: number;
  prompt: string;
  /** File name under KNOWLEDGE_BASE_DIR; missing files are skipped. */
  knowledgeBaseFile: string | null;
  buildTools: (deps: ToolDeps) => AgentTool[];
  suggestionRules: readonly SuggestionRule[];
  defaultSuggestions: readonly string[];
}

export const AGENT_DEFINITIONS: Record<AgentId, AgentDefinition> = {
  luthier_historian: {
    name: 'luthier_historian',
    role: 'Guitar Luthier & Historian',
    displayName: 'Guitar Luthier & Historian',
    description: 'Expert in guitar construction, tonewood science, instrument history, and famous luthiers',
    exampleQueries: [
      'Who built the first archtop guitar?',
      'What wood is best for an acoustic guitar top?',
      'Tell me about the history of the Fender Stratocaster',
    ],
    temperature: 0.3,
    maxTokens: 2000,
    prompt: luthierHistorianPrompt,
    knowledgeBaseFile: 'luthier_knowledge.md',
    buildTools: luthierTools,
    suggestionRules: [
      {
        keywords: ['archtop'],
        suggestions: ['Would you like to know about archtop tonewoods?', 'Want to hear about modern archtop builders?'],
      },
      {
        keywords: ['fender', 'telecaster', 'stratocaster'],
        suggestions: ['Interested in the differences between Fender body woods?'],
      },
      { keywords: ['pickup'], suggestions: ['Want to compare single-coil vs humbucker characteristics?'] },
      { keywords: ['wood'], suggestions: ['Should I explain how wood choice affects tone?'] },
    ],
    defaultSuggestions: [
      'Ask me about any guitar brand or luthier',
      'Want to know about guitar construction techniques?',
      'Curious about the history of a specific guitar model?',
    ],
  },
  jazz_teacher: {
    name: 'jazz_teacher',
    role: 'Jazz Guitar Teacher (Mastery Level)',
    displayName: 'Jazz Guitar Teacher (Mastery Level)',
    description: 'Master jazz educator covering theory, technique, improvisation, and practice methodology',
    exampleQueries: [
      'What scales work over a Dm7 chord?',
      'How do I break out of a playing rut?',
      'Explain the ii-V-I progression',
      'Quiz me on jazz chord types',
    ],
    temperature: 0.5,
    maxTokens: 2500,
    prompt: jazzTeacherPrompt,
    knowledgeBaseFile: 'jazz_teacher_knowledge.md',
    buildTools: jazzTeacherTools,
    suggestionRules: [
      {
        keywords: ['chord'],
        suggestions: ['Want me to quiz you on chord types?', 'Should I show you voicings for this chord?'],
      },
      {
        keywords: ['scale', 'mode'],
        suggestions: ['Want a practice exercise for this scale?', 'Should I show you which chords this scale works over?'],
      },
      { keywords: ['solo', 'improvise', 'improvisation'], suggestions: ['Want some specific licks to practice over this?'] },
      { keywords: ['rut', 'plateau', 'stuck'], suggestions: ['Want a customized plateau-busting practice plan?'] },
      { keywords: ['standard', 'tune'], suggestions: ['Want me to analyze the chord changes for this tune?'] },
    ],
    defaultSuggestions: [
      'Quiz me on jazz theory',
      'Give me a practice exercise',
      'Help me with improvisation',
    ],
  },
  sql_expert: {
    name: 'sql_expert',
    role: 'SQL & Data Expert with Natural Language Recognition',
    displayName: 'SQL & Data Expert',
    description: 'Translates natural language to SQL queries against the guitar knowledge database',
    exampleQueries: [
      'Show me all chords with difficulty 4 or higher',
      'How many jazz standards are in the database?',
      'Find all scales compatible with dominant 7th chords',
    ],
    temperature: 0.1,
    maxTokens: 1500,
    prompt: sqlExpertPrompt,
    knowledgeBaseFile: 'sql_patterns.md',
    buildTools: sqlExpertTools,
    suggestionRules: [],
    defaultSuggestions: [],
  },
  dev_pm: {
    name: 'dev_pm',
    role: 'Full Stack Developer & Project Manager',
    displayName: 'Full Stack Developer & PM',
    description: 'Manages development workflow, benchmarks, documentation, and system health',
    exampleQueries: [
      "What's the current development status?",
      'Show me recent error logs',
      'Generate a progress report',
    ],
    temperature: 0.2,
    maxTokens: 2000,
    prompt: devPmPrompt,
    knowledgeBaseFile: 'dev_pm_playbook.md',
    buildTools: (deps) => devPmTools(deps),
    suggestionRules: [],
    defaultSuggestions: [],
  },
};

export function validateAgentDefinition(def: AgentDefinition): void {
  if (!def.role.trim()) throw new Error(`Agent ${def.name}: role is required`);
  if (!def.prompt.trim()) throw new Error(`Agent ${def.name}: prompt is required`);
  if (!(def.temperature >= 0 && def.temperature <= 1)) {
    throw new Error(`Agent ${def.name}: temperature must be between 0 and 1, got ${def.temperature}`);
  }
  if (!Number.isInteger(def.maxTokens) || def.maxTokens <= 0) {
    throw new Error(`Agent ${def.name}: maxTokens must be a positive integer, got ${def.maxTokens}`);
  }
}

/**
 * Read an agent's reference notes from disk. A missing file is not an error;
 * the agent runs on its prompt alone.
 */
export function loadKnowledgeBase(dir: string, fileName: string | null): string | null {
  if (!fileName) return null;
  const filePath = path.resolve(dir, fileName);
  try {
    const text = fs.readFileSync(filePath, 'utf-8');
    console.log(`[Registry] Loaded knowledge base ${fileName} (${text.length} chars)`);
    return text;
  } catch {
    console.warn(`[Registry] No knowledge base found at ${filePath}`);
    return null;
  }
}

export interface AgentFactoryDeps {
  client: LlmClient;
  db: Database | null;
  config: Pick<AppConfig, 'DEFAULT_MODEL' | 'KNOWLEDGE_BASE_DIR'>;
  definitions?: Record<AgentId, AgentDefinition>;
}

export function createAgents(deps: AgentFactoryDeps): Map<AgentId, AgentCapability> {
  const definitions = deps.definitions ?? AGENT_DEFINITIONS;
  const agents = new Map<AgentId, AgentCapability>();

  for (const id of AGENT_IDS) {
    const def = definitions[id];
    validateAgentDefinition(def);

    const knowledgeBase = loadKnowledgeBase(deps.config.KNOWLEDGE_BASE_DIR, def.knowledgeBaseFile);
    const settings: AgentSettings = {
      name: def.name,
      role: def.role,
      model: deps.config.DEFAULT_MODEL,
      temperature: def.temperature,
      maxTokens: def.maxTokens,
      prompt: def.prompt,
      knowledgeBase,
      tools: def.buildTools({ db: deps.db, knowledgeBase }),
      suggestionRules: def.suggestionRules,
      defaultSuggestions: def.defaultSuggestions,
    };
    agents.set(id, new LlmAgent(settings, deps.client));
  }

  console.log(`[Registry] Initialized ${agents.size} agents: ${[...agents.keys()].join(', ')}`);
  return agents;
}

export function listAgentCatalog(): Array<{
  name: AgentId;
  display_name: string;
  description: string;
  example_queries: readonly string[];
}> {
  return AGENT_IDS.map((id) => {
    const def = AGENT_DEFINITIONS[id];
    return {
      name: def.name,
      display_name: def.displayName,
      description: def.description,
      example_queries: def.exampleQueries,
    };
  });
}
