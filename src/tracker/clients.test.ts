import { describe, it, expect } from 'vitest';
import { createTrackerClients } from './clients.js';
import { ConfigSchema, type Config } from '../types/index.js';
import { CongressClient } from '../sources/congress.js';

function config(apiKey: string | undefined): Config {
  return ConfigSchema.parse({
    congress: { apiKey, apiBase: 'https://api.congress.example/v3' },
    federalRegister: { apiBase: 'https://fr.example.gov/api/v1' },
    openFema: { apiBase: 'https://fema.example.gov/api/open/v2' },
    sendgrid: {},
    paths: { settings: 'config.yaml', watchlist: 'watchlist.yaml', state: 'state.json', digestDir: 'digests' },
    http: { timeoutMs: 5000, retries: 0, retryDelayMs: 0 },
    logLevel: 'error',
    logPretty: false,
  });
}

describe('createTrackerClients', () => {
  it('should build every client around one snapshot store', () => {
    const clients = createTrackerClients(config('test-key'));

    expect(clients.congress).toBeInstanceOf(CongressClient);
    expect(clients.store.filePath).toBe('state.json');
    expect(clients.email.isConfigured).toBe(false);
  });

  it('should require a Congress.gov key', () => {
    expect(() => createTrackerClients(config(undefined))).toThrow('CONGRESS_API_KEY is not set');
  });
});
