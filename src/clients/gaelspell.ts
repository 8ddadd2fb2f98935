import { z } from 'zod';
import type { HttpClient } from '../http/client.js';
import type { Logger } from '../logging.js';
import { HEALTH_PATH } from './gramadoir.js';
import { joinUrl, type SpellCorrection, type UpstreamClientOptions } from './types.js';
import { postText } from './upstream.js';

const spellWireSchema = z.array(z.tuple([z.string(), z.array(z.string())]));

export type GaelspellWire = z.infer<typeof spellWireSchema>;

export const GAELSPELL_CHECK_PATH = '/api/gaelspell/1.0';

/**
 * The upstream reports only the misspelt token; offsets come from finding
 * each token in the input, left to right.
 */
export function normalizeCorrections(text: string, wire: GaelspellWire): SpellCorrection[] {
  let cursor = 0;
  return wire.map(([token, suggestions]) => {
    const index = token === '' ? -1 : text.indexOf(token, cursor);
    const start = index >= 0 ? index : 0;
    const end = index >= 0 ? index + token.length : 0;
    if (index >= 0) cursor = end;
    return {
      token,
      code: 'SPELLING',
      message: `unknown word: ${token}`,
      start,
      end,
      suggestions
    };
  });
}

/**
 * Client for the GaelSpell REST API.
 */
export class GaelspellClient {
  constructor(
    private readonly baseUrl: string,
    private readonly http: HttpClient,
    private readonly options: UpstreamClientOptions,
    private readonly logger: Logger
  ) {}

  async check(text: string): Promise<SpellCorrection[]> {
    const wire = await postText(this.http, this.options, this.logger, {
      service: 'gaelspell',
      url: joinUrl(this.baseUrl, GAELSPELL_CHECK_PATH),
      text,
      schema: spellWireSchema
    });
    return normalizeCorrections(text, wire);
  }

  health(): Promise<boolean> {
    return this.http.probe(joinUrl(this.baseUrl, HEALTH_PATH));
  }
}
