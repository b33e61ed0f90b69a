/**
 * Rule-based intent router.
 *
 * Scores a message against weighted entity and keyword patterns, picks the
 * winning agent and flags requests that span several domains. Pure and
 * synchronous so it can run on every message before any model call.
 */

import luthierEntities from './data/luthier-entities.json';
import { AGENT_IDS, AgentId, IntentCategory, RoutingDecision } from './types';

export interface PatternGroup {
  agent: AgentId;
  weight: number;
  patterns: RegExp[];
}

export interface ClassifierRules {
  /** Lower-case substrings; the first hit adds entityWeight once. */
  entities: readonly string[];
  entityAgent: AgentId;
  entityWeight: number;
  groups: PatternGroup[];
  /** History patterns that mark a guitar_history question rather than setup. */
  historyTopicPatterns: RegExp[];
  /** Runner-up must reach this fraction of the top score to trigger multi-agent. */
  multiAgentRatio: number;
  /** Score at which confidence saturates at 1.0. */
  confidenceDivisor: number;
  defaultAgent: AgentId;
  defaultConfidence: number;
  /** Tiebreak order for equal scores. */
  priority: readonly AgentId[];
}

const HISTORY_TOPIC_PATTERNS = [
  /\b(history|historical|evolution|origin|invented|created)\b/,
  /\b(luthier|builder|craftsman|workshop|shop)\b/,
];

const HISTORY_PATTERNS = [
  ...HISTORY_TOPIC_PATTERNS,
  /\b(tonewood|wood|spruce|mahogany|rosewood|maple|ebony)\b/,
  /\b(pickup|humbucker|single.coil|p-90|piezo|active)\b/,
  /\b(construction|bracing|neck\s*joint|frets|nut|saddle)\b/,
  /\b(setup|intonation|action|truss\s*rod|string\s*gauge)\b/,
  /\b(repair|restore|maintenance|restring|adjust)\b/,
];

const JAZZ_THEORY_PATTERNS = [
  /\b(chord|scale|mode|arpeggio|interval|key)\b/,
  /\b(dorian|mixolydian|lydian|phrygian|locrian|ionian|aeolian)\b/,
  /\b(bebop|altered|diminished|whole\s*tone|pentatonic|chromatic)\b/,
  /\b(ii-v-i|ii\s*v\s*i|2-5-1|two\s*five\s*one)\b/,
  /\b(improvise|improvisation|solo|comping|voicing)\b/,
  /\b(practice|routine|exercise|lesson|warmup|warm-up)\b/,
  /\b(rut|plateau|stuck|bored|stale|uninspired)\b/,
  /\b(jazz|swing|bebop|bossa|ballad|blues)\b/,
  /\b(wes montgomery|joe pass|pat metheny|jim hall|grant green)\b/,
  /\b(charlie parker|miles davis|john coltrane|bill evans)\b/,
  /\b(quiz|test|question)\b/,
  /\b(voice\s*lead|guide\s*tone|enclosure|targeting)\b/,
];

// "in the key of" is a filter over stored tunes, not a theory question
const DATA_QUERY_PATTERNS = [
  /\b(how many|list all|show me|find all|search for|count)\b/,
  /\b(which ones|what are all|give me all|display)\b/,
  /\b(database|query|data|records|entries)\b/,
  /\b(filter|sort|between|greater than|less than|in the key of)\b/,
  /\b(difficulty \d|category|type)\b/,
];

const SYSTEM_PATTERNS = [
  /\b(benchmark|progress|status|health|error|bug)\b/,
  /\b(documentation|changelog|log|report)\b/,
  /\b(test|deploy|build|version)\b/,
];

export const DEFAULT_CLASSIFIER_RULES: ClassifierRules = {
  entities: luthierEntities,
  entityAgent: 'luthier_historian',
  entityWeight: 3.0,
  groups: [
    { agent: 'luthier_historian', weight: 1.0, patterns: HISTORY_PATTERNS },
    { agent: 'jazz_teacher', weight: 1.0, patterns: JAZZ_THEORY_PATTERNS },
    { agent: 'sql_expert', weight: 1.5, patterns: DATA_QUERY_PATTERNS },
    { agent: 'dev_pm', weight: 1.0, patterns: SYSTEM_PATTERNS },
  ],
  historyTopicPatterns: HISTORY_TOPIC_PATTERNS,
  multiAgentRatio: 0.6,
  confidenceDivisor: 5.0,
  defaultAgent: 'jazz_teacher',
  defaultConfidence: 0.5,
  priority: AGENT_IDS,
};

function categoryFor(agent: AgentId, message: string, rules: ClassifierRules): IntentCategory {
  switch (agent) {
    case 'luthier_historian':
      return rules.historyTopicPatterns.some((p) => p.test(message)) ? 'guitar_history' : 'guitar_setup';
    case 'jazz_teacher':
      return 'music_theory';
    case 'sql_expert':
      return 'data_query';
    case 'dev_pm':
      return 'system';
  }
}

/** Category implied by routing to `agent`, e.g. for an explicit agent override. */
export function categoryForAgent(
  agent: AgentId,
  userMessage: string,
  rules: ClassifierRules = DEFAULT_CLASSIFIER_RULES
): IntentCategory {
  return categoryFor(agent, userMessage.toLowerCase().trim(), rules);
}

function formatScores(scores: Map<AgentId, number>): string {
  return [...scores].map(([agent, score]) => `${agent}=${score.toFixed(1)}`).join(', ');
}

export function classifyIntent(
  userMessage: string,
  rules: ClassifierRules = DEFAULT_CLASSIFIER_RULES
): RoutingDecision {
  const message = userMessage.toLowerCase().trim();

  const scores = new Map<AgentId, number>();
  for (const agent of rules.priority) scores.set(agent, 0);
  const add = (agent: AgentId, weight: number): void => {
    scores.set(agent, (scores.get(agent) ?? 0) + weight);
  };

  if (rules.entities.some((entity) => message.includes(entity))) {
    add(rules.entityAgent, rules.entityWeight);
  }

  for (const group of rules.groups) {
    for (const pattern of group.patterns) {
      if (pattern.test(message)) add(group.agent, group.weight);
    }
  }

  const rank = (agent: AgentId): number => {
    const index = rules.priority.indexOf(agent);
    return index === -1 ? rules.priority.length : index;
  };
  const ranked = [...scores]
    .sort(([a, scoreA], [b, scoreB]) => scoreB - scoreA || rank(a) - rank(b));

  const [winner, maxScore] = ranked[0] ?? [rules.defaultAgent, 0];

  if (maxScore === 0) {
    return {
      agentName: rules.defaultAgent,
      confidence: rules.defaultConfidence,
      intentCategory: 'general',
      reasoning: 'No strong pattern match; defaulting to the most general music agent.',
      isMultiAgent: false,
      secondaryAgents: [],
    };
  }

  const runnerUp = ranked[1]?.[1] ?? 0;
  const isMultiAgent = runnerUp > 0 && runnerUp >= maxScore * rules.multiAgentRatio;
  const secondaryAgents = isMultiAgent
    ? ranked.slice(1).filter(([, score]) => score > 0).map(([agent]) => agent)
    : [];

  return {
    agentName: winner,
    confidence: Math.min(1.0, maxScore / rules.confidenceDivisor),
    intentCategory: categoryFor(winner, message, rules),
    reasoning: `Pattern scores: ${formatScores(scores)}`,
    isMultiAgent,
    secondaryAgents,
  };
}

/**
 * True when a decision is ambiguous enough to justify a second opinion
 * (for example an LLM classifier) before dispatch.
 */
export function needsAdditionalClassification(decision: RoutingDecision): boolean {
  return decision.confidence < 0.4 || decision.isMultiAgent;
}
