import { z } from 'zod';
import type { HttpClient } from '../http/client.js';
import type { Logger } from '../logging.js';
import { joinUrl, parseOffset, type GrammarIssue, type UpstreamClientOptions } from './types.js';
import { postText } from './upstream.js';

const numeric = z.union([z.string(), z.number()]).optional();

const issueWireSchema = z
  .object({
    ruleId: z.string().optional(),
    msg: z.string().optional(),
    context: z.string().optional(),
    contextoffset: numeric,
    fromx: numeric,
    fromy: numeric,
    tox: numeric,
    toy: numeric,
    errorlength: numeric,
    suggestions: z.array(z.string()).optional()
  })
  .passthrough();

const grammarWireSchema = z.array(issueWireSchema);

export type GramadoirIssueWire = z.infer<typeof issueWireSchema>;

export const GRAMADOIR_CHECK_PATH = '/api/gramadoir/1.0';
export const HEALTH_PATH = '/health';

export function normalizeIssue(wire: GramadoirIssueWire): GrammarIssue {
  const start = parseOffset(wire.fromx);
  // Some deployments only report the length of the flagged span.
  const end = wire.tox === undefined ? start + parseOffset(wire.errorlength) : parseOffset(wire.tox);
  return {
    code: wire.ruleId ?? '',
    message: wire.msg ?? '',
    start,
    end,
    suggestions: wire.suggestions ?? []
  };
}

/**
 * Client for the Gramadóir grammar checker REST API.
 */
export class GramadoirClient {
  constructor(
    private readonly baseUrl: string,
    private readonly http: HttpClient,
    private readonly options: UpstreamClientOptions,
    private readonly logger: Logger
  ) {}

  async check(text: string): Promise<GrammarIssue[]> {
    const issues = await postText(this.http, this.options, this.logger, {
      service: 'gramadoir',
      url: joinUrl(this.baseUrl, GRAMADOIR_CHECK_PATH),
      text,
      schema: grammarWireSchema
    });
    return issues.map(normalizeIssue);
  }

  health(): Promise<boolean> {
    return this.http.probe(joinUrl(this.baseUrl, HEALTH_PATH));
  }
}
