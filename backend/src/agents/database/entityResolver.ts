/**
 * Suggests known employees, locations and activities when a question names
 * something the warehouse does not have
 */

import { createComponentLogger } from '../../config/logger';
import type { Warehouse } from '../../services/bigquery.service';
import type { DatabaseSettings, Row } from '../../types/agent.types';

const logger = createComponentLogger('entity-resolver');

export type EntityType = 'employee' | 'location' | 'activity';

export interface EntitySuggestion {
  original: string;
  suggestion: string;
  confidence: number;
  entityType: EntityType;
  reason: string;
}

export interface EntityResolverOptions {
  threshold: number;
  maxPerEntity: number;
}

const ENTITY_LIMIT = 10000;

const ENTITY_QUERIES: Record<EntityType, (table: string) => string> = {
  employee: table =>
    `SELECT DISTINCT CONCAT(COALESCE(first_name, ''), ' ', COALESCE(last_name, '')) AS name FROM ${table} ` +
    `WHERE first_name IS NOT NULL AND first_name != '' LIMIT ${ENTITY_LIMIT}`,
  location: table => `SELECT DISTINCT name AS name FROM ${table} WHERE name IS NOT NULL LIMIT ${ENTITY_LIMIT}`,
  activity: table =>
    `SELECT DISTINCT description AS name FROM ${table} WHERE description IS NOT NULL LIMIT ${ENTITY_LIMIT}`
};

const ENTITY_TYPES: EntityType[] = ['employee', 'location', 'activity'];

// capitalised words that start questions rather than name things
const STOP_WORDS = new Set([
  'a', 'all', 'an', 'and', 'any', 'are', 'by', 'can', 'compare', 'count', 'did', 'do', 'does', 'find', 'for',
  'from', 'get', 'give', 'has', 'have', 'how', 'i', 'in', 'is', 'list', 'me', 'of', 'on', 'please', 'show',
  'tell', 'the', 'total', 'was', 'were', 'what', 'when', 'where', 'which', 'who', 'why', 'with'
]);

const QUOTED = /["“]([^"”]{2,})["”]/g;
const CAPITALISED_RUN = /\b[A-Z][\w'-]*(?:\s+[A-Z][\w'-]*)*/g;

/**
 * Edit distance between two strings
 */
export function levenshtein(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Case-insensitive similarity from 0 to 1
 */
export function similarity(a: string, b: string): number {
  const left = a.trim().toLowerCase();
  const right = b.trim().toLowerCase();
  const longest = Math.max(left.length, right.length);
  if (longest === 0) {
    return 1;
  }
  return 1 - levenshtein(left, right) / longest;
}

/**
 * Quoted phrases and runs of capitalised words that may name an entity
 */
export function extractCandidates(question: string): string[] {
  const candidates = new Map<string, string>();
  const add = (text: string) => {
    const cleaned = text.replace(/'s$/i, '').trim();
    if (cleaned.length >= 2 && !STOP_WORDS.has(cleaned.toLowerCase())) {
      candidates.set(cleaned.toLowerCase(), cleaned);
    }
  };

  for (const match of question.matchAll(QUOTED)) {
    add(match[1]);
  }
  for (const match of question.matchAll(CAPITALISED_RUN)) {
    const words = match[0].split(/\s+/);
    while (words.length > 0 && STOP_WORDS.has(words[0].toLowerCase())) {
      words.shift();
    }
    add(words.join(' '));
  }

  return [...candidates.values()];
}

const distinctNames = (rows: Row[]): string[] => [
  ...new Set(
    rows
      .map(row => row.name)
      .filter((value): value is string => typeof value === 'string')
      .map(value => value.trim())
      .filter(value => value.length > 0)
  )
];

/**
 * Best score of a candidate against a known name; single words also match one part of the name
 */
const score = (candidate: string, name: string): number => {
  const whole = similarity(candidate, name);
  if (/\s/.test(candidate)) {
    return whole;
  }
  return Math.max(whole, ...name.split(/\s+/).map(part => similarity(candidate, part)));
};

export class EntityResolver {
  private readonly options: EntityResolverOptions;
  private readonly cache = new Map<string, Map<EntityType, string[]>>();

  constructor(
    private readonly warehouse: Warehouse,
    options: Partial<EntityResolverOptions> = {}
  ) {
    this.options = { threshold: 0.5, maxPerEntity: 3, ...options };
  }

  /**
   * Known entities close to, but not the same as, the names in a question
   */
  async suggest(question: string, settings: DatabaseSettings): Promise<EntitySuggestion[]> {
    const candidates = extractCandidates(question);
    if (candidates.length === 0) {
      return [];
    }

    const entities = await this.entitiesFor(settings);
    const suggestions: EntitySuggestion[] = [];

    for (const original of candidates) {
      const matches: EntitySuggestion[] = [];
      for (const [entityType, names] of entities) {
        for (const name of names) {
          if (name.toLowerCase() === original.toLowerCase()) {
            continue;
          }
          const confidence = score(original, name);
          if (confidence >= this.options.threshold) {
            matches.push({ original, suggestion: name, confidence, entityType, reason: `Similar ${entityType} found` });
          }
        }
      }
      matches.sort((a, b) => b.confidence - a.confidence);
      suggestions.push(...matches.slice(0, this.options.maxPerEntity));
    }

    return suggestions
      .sort((a, b) => b.confidence - a.confidence)
      .slice(0, this.options.maxPerEntity * 2);
  }

  /**
   * Distinct names per entity table, cached per dataset once every table loaded
   */
  private async entitiesFor(settings: DatabaseSettings): Promise<Map<EntityType, string[]>> {
    const key = `${settings.projectId}.${settings.datasetId}`;
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const entities = new Map<EntityType, string[]>();
    let complete = true;

    for (const entityType of ENTITY_TYPES) {
      if (!settings.tables.includes(entityType)) {
        continue;
      }
      const table = `\`${settings.projectId}.${settings.datasetId}.${entityType}\``;
      try {
        const { rows } = await this.warehouse.execute(ENTITY_QUERIES[entityType](table));
        entities.set(entityType, distinctNames(rows));
      } catch (error) {
        complete = false;
        logger.warn('Failed to load entity names', {
          entityType,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    if (complete) {
      this.cache.set(key, entities);
      logger.info('Entity names loaded', {
        dataset: key,
        counts: Object.fromEntries([...entities].map(([entityType, names]) => [entityType, names.length]))
      });
    }
    return entities;
  }
}

const RECOMMENDED_ACTIONS = [
  'Try the suggested corrections above',
  'Check spelling of names and locations',
  "Try using different variations (e.g., 'HS' vs 'High School')",
  'Verify the entity exists in the database'
];

/**
 * "Did you mean" block appended to an empty result
 */
export function formatEntitySuggestions(suggestions: EntitySuggestion[]): string {
  const lines = suggestions.map(
    item =>
      `- "${item.suggestion}" instead of "${item.original}" (${item.entityType}, ${Math.round(item.confidence * 100)}% match)`
  );
  return [
    'Did you mean:',
    ...lines,
    '',
    'Suggestions:',
    ...RECOMMENDED_ACTIONS.map(action => `- ${action}`)
  ].join('\n');
}
