import { parseArgs } from 'node:util';
import { GramadoirClient } from './clients/gramadoir.js';
import { configSchema } from './config/schema.js';
import { HttpClient, type FetchLike } from './http/client.js';
import { createSilentLogger } from './logging.js';
import { describeError } from './mcp/errors.js';

const DEFAULT_URL = 'http://localhost:8080';
const DEFAULT_TEXT = 'Tá an peann ar an mbord';
const CLI_TIMEOUT_MS = 5000;

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  env: NodeJS.ProcessEnv;
  fetchImpl?: FetchLike;
}

const USAGE = [
  'Usage: gael-tools-gateway <command> [options]',
  '',
  'Commands:',
  '  health [--url <url>]                  check GET <url>/healthz',
  '  status [--url <url>]                  show health and tool listing status',
  '  config                                validate the environment configuration',
  '  test-grammar [--url <url>] [--text <text>]  call the grammar upstream directly'
].join('\n');

function trimUrl(url: string): string {
  return url.replace(/\/+$/, '');
}

async function health(url: string, http: HttpClient, io: CliIo): Promise<number> {
  try {
    const code = await http.sendForStatus(`${trimUrl(url)}/healthz`, { method: 'GET' });
    if (code < 200 || code >= 300) {
      io.err(`Health check failed: HTTP ${code}`);
      return 1;
    }
    io.out('Service is healthy');
    return 0;
  } catch (error) {
    io.err(`Health check failed: ${describeError(error)}`);
    return 1;
  }
}

async function status(url: string, http: HttpClient, io: CliIo): Promise<number> {
  const base = trimUrl(url);
  const healthy = await http.probe(`${base}/healthz`);
  io.out(`Health: ${healthy ? 'healthy' : 'unhealthy'}`);

  try {
    const code = await http.sendForStatus(`${base}/mcp`, {
      method: 'POST',
      json: { jsonrpc: '2.0', id: 1, method: 'tools/list', params: {} }
    });
    io.out(code === 200 ? 'Tools: available' : `Tools: HTTP ${code}`);
  } catch (error) {
    io.out(`Tools: unavailable (${describeError(error)})`);
  }

  io.out(`Mode: ${io.env.MODE ?? 'server'}`);
  io.out(`Port: ${io.env.PORT ?? '8080'}`);
  io.out(`Log level: ${io.env.LOG_LEVEL ?? 'info'}`);
  io.out(`Grammar service: ${io.env.GRAMADOIR_BASE_URL || 'not configured'}`);
  io.out(`Spellcheck service: ${io.env.SPELLCHECK_BASE_URL || 'not configured'}`);
  return healthy ? 0 : 1;
}

function validateConfig(io: CliIo): number {
  const parsed = configSchema.safeParse(io.env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    io.err(`Configuration validation failed: ${details}`);
    return 1;
  }
  io.out('Configuration is valid');
  return 0;
}

async function testGrammar(url: string | undefined, text: string, http: HttpClient, io: CliIo): Promise<number> {
  const baseUrl = url ?? io.env.GRAMADOIR_BASE_URL;
  if (!baseUrl) {
    io.err('Grammar service test failed: no grammar service URL provided');
    return 1;
  }

  const client = new GramadoirClient(baseUrl, http, { retries: 0 }, createSilentLogger());
  try {
    const issues = await client.check(text);
    io.out(`Grammar check for: "${text}"`);
    io.out(`Found ${issues.length} issues:`);
    issues.forEach((issue, index) => {
      io.out(`  ${index + 1}. ${issue.message} (${issue.code}:${issue.start}:${issue.end})`);
    });
    return 0;
  } catch (error) {
    io.err(`Grammar service test failed: ${describeError(error)}`);
    return 1;
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      url: { type: 'string', short: 'u' },
      text: { type: 'string', short: 't' },
      help: { type: 'boolean', short: 'h' }
    }
  });
}

/**
 * Admin commands. Resolves to the process exit code.
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.err(describeError(error));
    io.err(USAGE);
    return 2;
  }

  const [command] = parsed.positionals;
  const { url, text, help } = parsed.values;
  if (help || !command) {
    io.out(USAGE);
    return help ? 0 : 2;
  }

  const http = new HttpClient({ timeoutMs: CLI_TIMEOUT_MS, fetchImpl: io.fetchImpl });

  switch (command) {
    case 'health':
      return health(url ?? DEFAULT_URL, http, io);
    case 'status':
      return status(url ?? DEFAULT_URL, http, io);
    case 'config':
      return validateConfig(io);
    case 'test-grammar':
      return testGrammar(url, text ?? DEFAULT_TEXT, http, io);
    default:
      io.err(`Unknown command: ${command}`);
      io.err(USAGE);
      return 2;
  }
}
