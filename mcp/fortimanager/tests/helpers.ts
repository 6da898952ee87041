import { FmgClient } from '../src/lib/fmg-client.js';
import type { ServerConfig } from '../src/lib/config.js';
import type { ToolContext } from '../src/tools/context.js';

export function testConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    host: 'fmg.test',
    port: 443,
    username: '',
    password: '',
    apiToken: 'test-token',
    verifySsl: true,
    timeout: 30,
    maxRetries: 0,
    toolMode: 'full',
    allowedOutputDirs: '',
    defaultAdom: 'root',
    logLevel: 'ERROR',
    ...overrides,
  };
}

/** Client that never touches the network; tests spy on the methods they need */
export function testClient(): FmgClient {
  return new FmgClient({ host: 'fmg.test', apiToken: 'test-token', verifySsl: true, maxRetries: 0 });
}

export function testContext(overrides: Partial<ServerConfig> = {}): ToolContext {
  return { client: testClient(), config: testConfig(overrides) };
}

/** Tool handlers return pretty-printed JSON */
export function parse(text: string): unknown {
  return JSON.parse(text);
}
