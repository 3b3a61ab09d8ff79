import { genkit, type Genkit } from 'genkit';
import { googleAI } from '@genkit-ai/googleai';
import type { AppConfig } from '@/lib/config';

let instance: Genkit | null = null;

/**
 * The process-wide Genkit instance, built on first use. Later calls return
 * the same instance regardless of the config passed.
 */
export function getAi(config: Pick<AppConfig, 'apiKey' | 'model'>): Genkit {
  instance ??= genkit({
    plugins: [googleAI(config.apiKey ? { apiKey: config.apiKey } : undefined)],
    model: config.model,
  });
  return instance;
}
