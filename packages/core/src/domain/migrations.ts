import { SCHEMA_VERSION, type DomainEnvelope } from './schemas';

export type Migration<T> = (input: unknown) => T;

type Step = (payload: unknown) => unknown;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

// Unversioned files kept the OpenRouter key and model at the top level.
const liftFlatOpenRouterFields: Step = (payload) => {
  if (!isRecord(payload)) return payload;
  const { openRouterApiKey, selectedModel, ...rest } = payload;
  if (openRouterApiKey === undefined && selectedModel === undefined) return payload;
  const openRouter = isRecord(rest.openRouter) ? rest.openRouter : {};
  return {
    ...rest,
    openRouter: {
      ...openRouter,
      ...(typeof openRouterApiKey === 'string' ? { apiKey: openRouterApiKey } : {}),
      ...(typeof selectedModel === 'string' ? { model: selectedModel } : {}),
    },
  };
};

const STEPS: Record<number, Step> = {
  0: liftFlatOpenRouterFields,
};

export const migrateToCurrent = <T>(input: DomainEnvelope, parser: Migration<T>) => {
  const version = input.version ?? 0;
  if (version > SCHEMA_VERSION) {
    throw new Error(`Unsupported schema version: ${version}`);
  }
  let payload = input.payload;
  for (let current = version; current < SCHEMA_VERSION; current += 1) {
    const step = STEPS[current];
    if (step) payload = step(payload);
  }
  return parser(payload);
};
