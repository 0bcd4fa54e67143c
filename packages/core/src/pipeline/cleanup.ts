import type { Settings } from '../domain/schemas';

/** One rewrite applied to every transcript before it reaches a pipeline. */
export interface TranscriptRule {
  name: string;
  applies(settings: Settings): boolean;
  apply(text: string, settings: Settings): string;
}

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const eachLine = (text: string, rewrite: (line: string) => string) =>
  text.split(/\r\n|\r|\n/).map(rewrite).join('\n').trim();

export const collapseWhitespace: TranscriptRule = {
  name: 'whitespace',
  applies: () => true,
  apply: (text) => eachLine(text, (line) => line.replace(/\s+/g, ' ').trim()),
};

/**
 * Whole-word, case-insensitive replacements.
 * Word edges are Unicode letters, digits and underscore.
 */
export const applyVocabulary: TranscriptRule = {
  name: 'vocabulary',
  applies: (settings) => settings.vocabulary.some((entry) => entry.source.trim() !== ''),
  apply: (text, settings) =>
    settings.vocabulary.reduce((current, { source, replacement }) => {
      const word = source.trim();
      if (!word) return current;
      const edge = '[\\p{L}\\p{N}_]';
      const pattern = new RegExp(`(?<!${edge})${escapeRegExp(word)}(?!${edge})`, 'giu');
      return current.replace(pattern, () => replacement);
    }, text),
};

export const tidyPunctuation: TranscriptRule = {
  name: 'punctuation',
  applies: (settings) => settings.transcription.punctuationNormalization,
  apply: (text) =>
    eachLine(text, (line) =>
      line
        .replace(/\s+([,.;:!?])/g, '$1')
        .replace(/\.{4,}/g, '...')
        .trim()
    ),
};

export const DEFAULT_TRANSCRIPT_RULES: readonly TranscriptRule[] = [
  collapseWhitespace,
  applyVocabulary,
  tidyPunctuation,
];

export const cleanTranscript = (
  text: string,
  settings: Settings,
  rules: readonly TranscriptRule[] = DEFAULT_TRANSCRIPT_RULES
) =>
  rules.reduce(
    (current, rule) => (rule.applies(settings) ? rule.apply(current, settings) : current),
    text
  );
