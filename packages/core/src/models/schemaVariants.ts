import { DEFAULT_CONTEXT_LENGTH, type ModelDescriptor } from './types';

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

export interface FieldNames {
  list: string;
  id: string;
  name: string;
  description: string;
  pricing: string;
  prompt: string;
  contextLength: string;
}

export interface ModelListStrategy {
  id: string;
  parse(payload: unknown): ModelDescriptor[] | null;
}

const toNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

const toText = (value: unknown) => (typeof value === 'string' ? value : undefined);

const readEntry = (entry: unknown, fields: FieldNames): ModelDescriptor | null => {
  if (!isRecord(entry)) return null;
  const id = toText(entry[fields.id])?.trim();
  if (!id) return null;
  const pricing = entry[fields.pricing];
  const contextLength = toNumber(entry[fields.contextLength]);
  return {
    id,
    name: toText(entry[fields.name]) || id,
    description: toText(entry[fields.description]) ?? '',
    promptPrice: (isRecord(pricing) ? toNumber(pricing[fields.prompt]) : undefined) ?? 0,
    contextLength: contextLength !== undefined ? Math.trunc(contextLength) : DEFAULT_CONTEXT_LENGTH,
  };
};

/**
 * A strategy for one naming convention. It only claims a payload in which some entry
 * carries its spelling of the context-length field, so snake_case and camelCase
 * payloads are never mistaken for each other.
 */
export const namedFieldStrategy = (id: string, fields: FieldNames): ModelListStrategy => ({
  id,
  parse: (payload) => {
    if (!isRecord(payload)) return null;
    const list = payload[fields.list];
    if (!Array.isArray(list)) return null;
    if (!list.some((entry) => isRecord(entry) && fields.contextLength in entry)) return null;
    const models = list
      .map((entry) => readEntry(entry, fields))
      .filter((m): m is ModelDescriptor => m !== null);
    return models.length ? models : null;
  },
});

const foldKey = (key: string) => key.replace(/[_-]/g, '').toLowerCase();

const foldKeys = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(foldKeys);
  if (!isRecord(value)) return value;
  const folded: JsonRecord = {};
  Object.entries(value).forEach(([key, inner]) => {
    folded[foldKey(key)] = foldKeys(inner);
  });
  return folded;
};

const FOLDED_FIELDS: FieldNames = {
  list: 'data',
  id: 'id',
  name: 'name',
  description: 'description',
  pricing: 'pricing',
  prompt: 'prompt',
  contextLength: 'contextlength',
};

/** Last resort: ignores case and separators, and tolerates a missing context length. */
export const caseInsensitiveStrategy: ModelListStrategy = {
  id: 'case-insensitive',
  parse: (payload) => {
    const folded = foldKeys(payload);
    if (!isRecord(folded)) return null;
    const list = folded[FOLDED_FIELDS.list] ?? folded.models;
    if (!Array.isArray(list)) return null;
    const models = list
      .map((entry) => readEntry(entry, FOLDED_FIELDS))
      .filter((m): m is ModelDescriptor => m !== null);
    return models.length ? models : null;
  },
};

export const DEFAULT_STRATEGIES: ModelListStrategy[] = [
  namedFieldStrategy('snake_case', {
    list: 'data',
    id: 'id',
    name: 'name',
    description: 'description',
    pricing: 'pricing',
    prompt: 'prompt',
    contextLength: 'context_length',
  }),
  namedFieldStrategy('camelCase', {
    list: 'data',
    id: 'id',
    name: 'name',
    description: 'description',
    pricing: 'pricing',
    prompt: 'prompt',
    contextLength: 'contextLength',
  }),
  namedFieldStrategy('PascalCase', {
    list: 'Data',
    id: 'Id',
    name: 'Name',
    description: 'Description',
    pricing: 'Pricing',
    prompt: 'Prompt',
    contextLength: 'ContextLength',
  }),
  caseInsensitiveStrategy,
];

export interface ParsedModelList {
  strategy: string;
  models: ModelDescriptor[];
}

/** Applies each strategy in order; null when none yields a model. */
export const parseModelList = (
  payload: unknown,
  strategies: ModelListStrategy[] = DEFAULT_STRATEGIES
): ParsedModelList | null => {
  for (const strategy of strategies) {
    const models = strategy.parse(payload);
    if (models?.length) return { strategy: strategy.id, models };
  }
  return null;
};
