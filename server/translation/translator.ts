import type { AppConfig } from '../../shared/config';
import type { GenerateContentResponse } from '@google/genai';
import { TranslationError } from '../errors';
import type { Logger } from '../obs/logger';
import { rateLimitedGenerateContent, type GenerateTextParams } from '../services/genai';

/** Text-in, text-out translation into a single target language. */
export interface Translator {
  readonly name: string;
  translate: (text: string, targetLanguage: string) => Promise<string>;
}

export const createPassthroughTranslator = (): Translator => ({
  name: 'none',
  translate: async (text) => text,
});

type GenerateFn = (config: Pick<AppConfig, 'llm'>, params: GenerateTextParams) => Promise<GenerateContentResponse>;

export const buildTranslationPrompt = (text: string, languageName: string, languageCode: string): string =>
  [
    `Translate the following text into ${languageName} (${languageCode}).`,
    'Reply with the translation only: no quotes, notes or transliteration.',
    '',
    text,
  ].join('\n');

export const createGeminiTranslator = (
  config: Pick<AppConfig, 'llm' | 'translation'>,
  generate: GenerateFn = rateLimitedGenerateContent,
): Translator => ({
  name: 'gemini',
  translate: async (text, targetLanguage) => {
    const response = await generate(config, {
      prompt: buildTranslationPrompt(text, config.translation.targetLanguageName, targetLanguage),
    });
    const translated = response.text?.trim();
    if (!translated) {
      throw new TranslationError('Empty translation response');
    }
    return translated;
  },
});

export const createTranslator = (config: Pick<AppConfig, 'llm' | 'translation'>, logger: Logger): Translator => {
  if (config.translation.provider === 'gemini') {
    if (config.llm.apiKey) {
      return createGeminiTranslator(config);
    }
    logger.warn('Translation provider is gemini but GEMINI_API_KEY is missing; passing text through');
  }
  return createPassthroughTranslator();
};

/**
 * Translates `text`, returning it unchanged when the translator fails or answers empty.
 */
export const translateOrOriginal = async (
  translator: Translator,
  text: string,
  targetLanguage: string,
  logger: Logger,
): Promise<string> => {
  try {
    const translated = (await translator.translate(text, targetLanguage)).trim();
    if (!translated) {
      throw new TranslationError('Empty translation');
    }
    return translated;
  } catch (error) {
    const failure =
      error instanceof TranslationError
        ? error
        : new TranslationError(error instanceof Error ? error.message : String(error), { cause: error });
    logger.warn('Translation failed; keeping original text', {
      translator: translator.name,
      error: failure.message,
      textLength: text.length,
    });
    return text;
  }
};
