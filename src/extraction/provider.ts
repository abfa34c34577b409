import { ExtractionError, toErrorMessage } from '../errors';
import { createLogger } from '../utils/logger';
import { parseExtractionPayload } from './payload';
import type { ExtractionProvider, ExtractionResult } from './types';

const logger = createLogger('extraction');

export interface CompletionExtractionOptions {
  /** Any text-completion call: given the transcript, return the model's raw reply. */
  complete: (text: string) => Promise<string>;
}

export function createCompletionExtractionProvider(
  options: CompletionExtractionOptions,
): ExtractionProvider {
  return {
    async extract(text: string): Promise<ExtractionResult> {
      const input = text.trim();
      if (!input) throw new ExtractionError('cannot extract from empty text');

      let reply: string;
      try {
        reply = await options.complete(input);
      } catch (error) {
        logger.log('completion failed', { error });
        throw new ExtractionError(`completion failed: ${toErrorMessage(error)}`, {
          cause: error,
        });
      }
      const result = parseExtractionPayload(reply);
      logger.log('parsed completion', {
        persons: result.persons.length,
        relationships: result.relationships?.length ?? 0,
      });
      return result;
    },
  };
}
