import { errorMessage } from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import { openaiChat, type OpenAIConnection } from '../lib/openaiClient.js';

export interface BiographySubject {
  name: string;
  species?: string;
  homeworld?: string;
  affiliations: string[];
}

export interface BiographyGenerator {
  generate(subject: BiographySubject): Promise<string>;
}

export function fallbackBiography(subject: BiographySubject): string {
  const species = subject.species || 'being';
  const homeworld = subject.homeworld || 'an unknown world';
  return `A ${species} from ${homeworld}, ${subject.name} is a character of interest.`;
}

export function biographyPrompt(subject: BiographySubject): string {
  return [
    `Write a short, engaging biography (2-3 sentences) for the Star Wars character ${subject.name}.`,
    '',
    'Known details:',
    `- Species: ${subject.species || 'Unknown'}`,
    `- Homeworld: ${subject.homeworld || 'Unknown'}`,
    `- Affiliations: ${subject.affiliations.length ? subject.affiliations.join(', ') : 'None known'}`,
    '',
    'Stay true to the setting and focus on their role and significance. Return only the biography.',
  ].join('\n');
}

/**
 * Chat-completion backed biography writer. Never throws: without an API key
 * or when the call fails it returns `fallbackBiography`.
 */
export function createBiographyGenerator(opts: { conn: OpenAIConnection; model: string; logger?: Logger }): BiographyGenerator {
  const log = (opts.logger ?? rootLogger).child({ component: 'biography' });

  return {
    async generate(subject: BiographySubject): Promise<string> {
      if (!opts.conn.apiKey) return fallbackBiography(subject);
      try {
        const { content, latencyMs } = await openaiChat(
          opts.conn,
          [{ role: 'user', content: biographyPrompt(subject) }],
          { model: opts.model, temperature: 0.7 },
        );
        log.debug({ name: subject.name, latencyMs }, 'biography generated');
        return content || fallbackBiography(subject);
      } catch (e) {
        log.warn({ name: subject.name, err: errorMessage(e) }, 'biography generation failed, using fallback');
        return fallbackBiography(subject);
      }
    },
  };
}
