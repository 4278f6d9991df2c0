export type TranslationResult =
  | { translated: true; text: string }
  | { translated: false; text: string };

export type Translator = (text: string) => Promise<TranslationResult>;

export interface TranslateConfig {
  apiBaseUrl: string;
  source?: string;
  target?: string;
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

// Response shape: [[["translated", "source", ...], ...], ...]
function joinSegments(payload: unknown): string | undefined {
  if (!Array.isArray(payload) || !Array.isArray(payload[0])) return undefined;

  const parts: string[] = [];
  for (const segment of payload[0]) {
    if (Array.isArray(segment) && typeof segment[0] === 'string') {
      parts.push(segment[0]);
    }
  }
  const joined = parts.join('');
  return joined.length > 0 ? joined : undefined;
}

export function createGoogleTranslator(config: TranslateConfig): Translator {
  const source = config.source ?? 'ja';
  const target = config.target ?? 'en';

  return async (text) => {
    if (!text) return { translated: false, text };

    try {
      const url = new URL('/translate_a/single', config.apiBaseUrl);
      url.searchParams.set('client', 'gtx');
      url.searchParams.set('sl', source);
      url.searchParams.set('tl', target);
      url.searchParams.set('dt', 't');
      url.searchParams.set('q', text);

      const res = await fetch(url, { headers: { Accept: 'application/json' } });
      if (!res.ok) {
        throw new Error(`Translate request failed (${res.status})`);
      }

      const translated = joinSegments(await res.json());
      if (!translated) {
        throw new Error('Translate response had no segments');
      }
      return { translated: true, text: translated };
    } catch (err) {
      // Translation is cosmetic; keep the source text.
      console.warn('[translate] falling back to source text', { text, error: errorMessage(err) });
      return { translated: false, text };
    }
  };
}

export async function translateText(translate: Translator, text: string): Promise<string> {
  const result = await translate(text);
  return result.text;
}
