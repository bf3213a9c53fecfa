import axios, { AxiosInstance, isAxiosError } from 'axios';
import { issueAdminToken } from '../middleware/adminAuth.middleware';

export const SETTING_ALIASES: Record<string, string> = {
  mode: 'processing_mode',
  processing_mode: 'processing_mode',
  priority: 'provider_priority',
  provider_priority: 'provider_priority',
  cost: 'cost_optimization',
  cost_optimization: 'cost_optimization',
  fallback: 'auto_fallback',
  auto_fallback: 'auto_fallback'
};

export const USAGE = [
  'Usage: npm run config -- <command>',
  '',
  'Commands:',
  '  status                 Show the running configuration',
  '  preset <name>          Apply a preset (speed, accuracy, cost, dev, prod)',
  '  set <key> <value>      Change one setting (mode, priority, cost, fallback)',
  '  test                   Run selection over the sample files',
  '  force <provider>       Force a provider for the session (SESSION_ID or "default")',
  '  clear                  Clear session overrides',
  '  token                  Print an admin JWT signed with JWT_SECRET_KEY',
  '',
  'Environment: API_BASE_URL (http://localhost:8000), CONFIG_API_KEY, SESSION_ID'
].join('\n');

export interface ConfigAdminOptions {
  baseUrl: string;
  apiKey?: string;
  sessionId?: string;
  http?: AxiosInstance;
}

export class ConfigAdminClient {
  private readonly http: AxiosInstance;

  constructor(private readonly options: ConfigAdminOptions) {
    this.http = options.http ?? axios.create({
      baseURL: `${options.baseUrl.replace(/\/+$/, '')}/api/v1/admin`,
      timeout: 30000
    });
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.options.apiKey) {
      headers['X-API-Key'] = this.options.apiKey;
    }
    if (this.options.sessionId) {
      headers['session-id'] = this.options.sessionId;
    }
    return headers;
  }

  async status(): Promise<unknown> {
    const response = await this.http.get('/current_config', { headers: this.headers() });
    return response.data;
  }

  async applyPreset(preset: string): Promise<unknown> {
    const response = await this.http.post('/apply_preset', { preset }, { headers: this.headers() });
    return response.data;
  }

  async set(key: string, value: string): Promise<unknown> {
    const field = SETTING_ALIASES[key];
    if (!field) {
      throw new Error(`Unknown setting '${key}'. Valid keys: ${Object.keys(SETTING_ALIASES).join(', ')}`);
    }
    const response = await this.http.post('/update_config', { [field]: value }, { headers: this.headers() });
    return response.data;
  }

  async test(): Promise<unknown> {
    const response = await this.http.post('/test_config', {}, { headers: this.headers() });
    return response.data;
  }

  async force(provider: string): Promise<unknown> {
    const response = await this.http.post(`/force_provider/${encodeURIComponent(provider)}`, {}, {
      headers: this.headers()
    });
    return response.data;
  }

  async clear(): Promise<unknown> {
    const response = await this.http.delete('/clear_session_overrides', { headers: this.headers() });
    return response.data;
  }
}

export function describeRequestError(error: unknown): string {
  if (isAxiosError(error)) {
    const body: unknown = error.response?.data;
    const message = typeof body === 'object' && body !== null && 'error' in body ? String(body.error) : error.message;
    return error.response ? `${error.response.status}: ${message}` : message;
  }
  return error instanceof Error ? error.message : String(error);
}

/** Runs one CLI command and returns the process exit code. */
export async function runConfigAdmin(
  args: string[],
  client: ConfigAdminClient,
  print: (line: string) => void,
  jwtSecret?: string
): Promise<number> {
  const [command, ...rest] = args;

  try {
    let result: unknown;
    switch (command) {
      case 'status':
        result = await client.status();
        break;
      case 'preset':
        if (!rest[0]) throw new Error('preset requires a name');
        result = await client.applyPreset(rest[0]);
        break;
      case 'set':
        if (rest.length < 2) throw new Error('set requires a key and a value');
        result = await client.set(rest[0], rest[1]);
        break;
      case 'test':
        result = await client.test();
        break;
      case 'force':
        if (!rest[0]) throw new Error('force requires a provider');
        result = await client.force(rest[0]);
        break;
      case 'clear':
        result = await client.clear();
        break;
      case 'token':
        if (!jwtSecret) throw new Error('JWT_SECRET_KEY is not set');
        print(issueAdminToken(jwtSecret));
        return 0;
      default:
        print(USAGE);
        return command ? 1 : 0;
    }
    print(JSON.stringify(result, null, 2));
    return 0;
  } catch (error) {
    print(`Error: ${describeRequestError(error)}`);
    return 1;
  }
}
