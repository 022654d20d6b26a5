import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export const PROMPT_KEYS = [
  'auto_dj',
  'auto_dj_batch',
  'recommend_next_song',
  'recommend_next_ten_songs',
  'create_playlist',
  'theme_based_playlist',
  'mystery_crate',
  'song_insights',
  'explain_lyrics',
  'generate_radio_intro',
] as const;

export type PromptKey = (typeof PROMPT_KEYS)[number];
export type PromptVariables = Record<string, string>;

const templatesSchema = z.object({
  auto_dj: z.string().min(1),
  auto_dj_batch: z.string().min(1),
  recommend_next_song: z.string().min(1),
  recommend_next_ten_songs: z.string().min(1),
  create_playlist: z.string().min(1),
  theme_based_playlist: z.string().min(1),
  mystery_crate: z.string().min(1),
  song_insights: z.string().min(1),
  explain_lyrics: z.string().min(1),
  generate_radio_intro: z.string().min(1),
});

export type PromptTemplates = z.infer<typeof templatesSchema>;

export const BUNDLED_PROMPTS_FILE = fileURLToPath(new URL('../../prompts/prompts.json', import.meta.url));

export function parsePromptTemplates(json: string): PromptTemplates {
  return templatesSchema.parse(JSON.parse(json));
}

export function loadPromptTemplates(file: string = BUNDLED_PROMPTS_FILE): PromptTemplates {
  return parsePromptTemplates(readFileSync(file, 'utf8'));
}

/** Fills `{name}` placeholders; unknown placeholders render empty. */
export function renderPrompt(template: string, variables: PromptVariables): string {
  return template.replace(/\{([a-z_]+)\}/g, (_match, name: string) => variables[name] ?? '');
}
