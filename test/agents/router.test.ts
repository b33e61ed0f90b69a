import { describe, it, expect } from 'vitest';
import {
  categoryForAgent,
  classifyIntent,
  DEFAULT_CLASSIFIER_RULES,
  needsAdditionalClassification,
} from '../../src/agents/router';
import type { RoutingDecision } from '../../src/agents/types';

describe('classifyIntent', () => {
  describe('Luthier routing', () => {
    it('should route a named luthier question to the historian', () => {
      const decision = classifyIntent("Tell me about D'Angelico archtop guitars");

      expect(decision.agentName).toBe('luthier_historian');
      expect(decision.confidence).toBeGreaterThan(0.4);
      expect(decision.isMultiAgent).toBe(false);
    });

    it('should count the entity bonus once however many entities appear', () => {
      const decision = classifyIntent('Gibson and Fender and Martin');

      expect(decision.confidence).toBeCloseTo(0.6);
      expect(decision.reasoning).toBe(
        'Pattern scores: luthier_historian=3.0, jazz_teacher=0.0, sql_expert=0.0, dev_pm=0.0'
      );
    });

    it('should tag history questions as guitar_history', () => {
      const decision = classifyIntent(
        'The history of the Gibson Les Paul: the wood, pickup, construction, setup and repair'
      );

      expect(decision.agentName).toBe('luthier_historian');
      expect(decision.intentCategory).toBe('guitar_history');
      expect(decision.confidence).toBe(1.0);
    });

    it('should tag maintenance questions as guitar_setup', () => {
      const decision = classifyIntent('How do I adjust the truss rod on my Fender?');

      expect(decision.agentName).toBe('luthier_historian');
      expect(decision.intentCategory).toBe('guitar_setup');
      expect(decision.confidence).toBe(1.0);
    });
  });

  describe('Jazz routing', () => {
    it('should route a chord question to the jazz teacher', () => {
      const decision = classifyIntent('What scales work over a Dm7 chord?');

      expect(decision.agentName).toBe('jazz_teacher');
      expect(decision.intentCategory).toBe('music_theory');
      expect(decision.confidence).toBeCloseTo(0.2);
      expect(decision.isMultiAgent).toBe(false);
    });
  });

  describe('Data routing', () => {
    it('should route a counting question about stored tunes to the SQL expert', () => {
      const decision = classifyIntent('How many jazz standards are in the key of Bb?');

      expect(decision.agentName).toBe('sql_expert');
      expect(decision.intentCategory).toBe('data_query');
      expect(decision.confidence).toBeCloseTo(0.6);
      expect(decision.isMultiAgent).toBe(true);
      expect(decision.secondaryAgents).toEqual(['jazz_teacher']);
    });
  });

  describe('System routing', () => {
    it('should route status questions to dev_pm', () => {
      const decision = classifyIntent('Check the health status and the changelog');

      expect(decision.agentName).toBe('dev_pm');
      expect(decision.intentCategory).toBe('system');
      expect(decision.confidence).toBeCloseTo(0.4);
    });
  });

  describe('Default routing', () => {
    it('should fall back to the jazz teacher when nothing matches', () => {
      const decision = classifyIntent('hello');

      expect(decision).toEqual({
        agentName: 'jazz_teacher',
        confidence: 0.5,
        intentCategory: 'general',
        reasoning: 'No strong pattern match; defaulting to the most general music agent.',
        isMultiAgent: false,
        secondaryAgents: [],
      });
    });

    it('should treat an empty message as unmatched', () => {
      expect(classifyIntent('   ').agentName).toBe('jazz_teacher');
    });

    it('should honour a custom default agent', () => {
      const decision = classifyIntent('hello', { ...DEFAULT_CLASSIFIER_RULES, defaultAgent: 'dev_pm' });

      expect(decision.agentName).toBe('dev_pm');
    });
  });

  describe('Multi-agent detection', () => {
    it('should break ties by agent priority and list the rest as secondaries', () => {
      const decision = classifyIntent('mahogany chord');

      expect(decision.agentName).toBe('luthier_historian');
      expect(decision.isMultiAgent).toBe(true);
      expect(decision.secondaryAgents).toEqual(['jazz_teacher']);
    });

    it('should order secondaries by score then priority', () => {
      const decision = classifyIntent('Count every chord that uses wood');

      expect(decision.agentName).toBe('sql_expert');
      expect(decision.confidence).toBeCloseTo(0.3);
      expect(decision.secondaryAgents).toEqual(['luthier_historian', 'jazz_teacher']);
    });

    it('should stay single-agent when the runner-up is well behind', () => {
      const decision = classifyIntent('Tell me about the Stratocaster and its chord charts');

      expect(decision.agentName).toBe('luthier_historian');
      expect(decision.isMultiAgent).toBe(false);
      expect(decision.secondaryAgents).toEqual([]);
    });

    it('should respect a stricter multi-agent ratio', () => {
      const decision = classifyIntent('How many jazz standards are in the key of Bb?', {
        ...DEFAULT_CLASSIFIER_RULES,
        multiAgentRatio: 0.9,
      });

      expect(decision.isMultiAgent).toBe(false);
    });
  });

  it('should be case-insensitive', () => {
    expect(classifyIntent('WHAT SCALES WORK OVER A DM7 CHORD?')).toEqual(
      classifyIntent('what scales work over a dm7 chord?')
    );
  });

  it('should keep confidence within [0, 1] for every decision', () => {
    const messages = [
      'hello',
      'Fender Gibson Martin wood pickup setup repair history construction',
      'How many jazz standards are in the key of Bb?',
      'benchmark status changelog deploy',
    ];
    for (const message of messages) {
      const { confidence } = classifyIntent(message);
      expect(confidence).toBeGreaterThanOrEqual(0);
      expect(confidence).toBeLessThanOrEqual(1);
    }
  });
});

describe('categoryForAgent', () => {
  it('should derive the category from the agent', () => {
    expect(categoryForAgent('dev_pm', 'What scales work over Dm7?')).toBe('system');
    expect(categoryForAgent('sql_expert', 'anything')).toBe('data_query');
    expect(categoryForAgent('luthier_historian', 'When was the truss rod INVENTED?')).toBe('guitar_history');
    expect(categoryForAgent('luthier_historian', 'How do I lower the action?')).toBe('guitar_setup');
  });
});

describe('needsAdditionalClassification', () => {
  const base: RoutingDecision = {
    agentName: 'jazz_teacher',
    confidence: 0.8,
    intentCategory: 'music_theory',
    reasoning: '',
    isMultiAgent: false,
    secondaryAgents: [],
  };

  it('should flag low-confidence decisions', () => {
    expect(needsAdditionalClassification({ ...base, confidence: 0.39 })).toBe(true);
  });

  it('should flag multi-agent decisions', () => {
    expect(needsAdditionalClassification({ ...base, isMultiAgent: true, secondaryAgents: ['sql_expert'] })).toBe(true);
  });

  it('should pass confident single-agent decisions', () => {
    expect(needsAdditionalClassification({ ...base, confidence: 0.4 })).toBe(false);
  });
});
