import fs from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_TIMEOUT_MS, envCredentialResolver, loadConfig, validateConfig } from '../config';
import { ConfigurationError } from '../core/interfaces';
import { MarketContextSchema } from '../types';
import { identity } from './support/fakes';

describe('loadConfig', () => {
  it('falls back to one advisor per provider', () => {
    const config = loadConfig({});

    expect(config.advisors.map((advisor) => [advisor.name, advisor.provider, advisor.config.credentialRef])).toEqual([
      ['Claude', 'claude', 'CLAUDE_API_KEY'],
      ['Gemini', 'gemini', 'GEMINI_API_KEY'],
      ['Grok', 'grok', 'GROK_API_KEY'],
      ['OpenAI', 'openai', 'OPENAI_API_KEY']
    ]);
    expect(config.advisors.every((advisor) => advisor.config.timeoutMs === DEFAULT_TIMEOUT_MS)).toBe(true);
    expect(config).toMatchObject({ defaultTimeoutMs: 60000, logLevel: 'info', nodeEnv: 'development', rejectedAdvisors: [] });
  });

  it('applies timeout, model and log level overrides', () => {
    const config = loadConfig({ ADVISOR_TIMEOUT_MS: '5000', CLAUDE_MODEL: 'claude-custom', LOG_LEVEL: 'debug', NODE_ENV: 'test' });

    expect(config.advisors[0].config).toEqual({ model: 'claude-custom', credentialRef: 'CLAUDE_API_KEY', timeoutMs: 5000 });
    expect(config).toMatchObject({ defaultTimeoutMs: 5000, logLevel: 'debug', nodeEnv: 'test' });
  });

  it('rejects malformed settings', () => {
    expect(() => loadConfig({ ADVISOR_TIMEOUT_MS: 'soon' })).toThrow('ADVISOR_TIMEOUT_MS must be a positive integer');
    expect(() => loadConfig({ ADVISOR_TIMEOUT_MS: '-5' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow('LOG_LEVEL must be one of debug, info, warn, error');
  });

  it('rejects a timeout beyond the largest timer delay', () => {
    expect(() => loadConfig({ ADVISOR_TIMEOUT_MS: '3000000000' }))
      .toThrow('ADVISOR_TIMEOUT_MS must be a positive integer up to 2147483647');
    expect(loadConfig({ ADVISOR_TIMEOUT_MS: '2147483647' }).defaultTimeoutMs).toBe(2147483647);
  });

  describe('with ADVISORS_FILE', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'advisors-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('keeps valid entries and reports rejected ones', () => {
      const file = path.join(dir, 'advisors.json');
      fs.writeFileSync(file, JSON.stringify([
        { name: 'Local', provider: 'openai', config: { model: 'llama3', endpoint: 'http://localhost:11434/v1', credentialRef: 'LOCAL_KEY' } },
        { name: 'Llama', provider: 'llama', config: { model: 'x', credentialRef: 'X_KEY', timeoutMs: 1000 } }
      ]));

      const config = loadConfig({ ADVISORS_FILE: file, ADVISOR_TIMEOUT_MS: '2000' });

      expect(config.advisors).toEqual([
        {
          name: 'Local',
          provider: 'openai',
          config: { model: 'llama3', endpoint: 'http://localhost:11434/v1', credentialRef: 'LOCAL_KEY', timeoutMs: 2000 }
        }
      ]);
      expect(config.rejectedAdvisors).toHaveLength(1);
      expect(config.rejectedAdvisors[0]).toMatchObject({ index: 1, name: 'Llama' });
      expect(config.rejectedAdvisors[0].issues[0]).toMatch(/^provider: /);
    });

    it('rejects a file entry whose timeout overflows a timer', () => {
      const file = path.join(dir, 'advisors.json');
      fs.writeFileSync(file, JSON.stringify([
        { name: 'Slow', provider: 'claude', config: { model: 'm', credentialRef: 'SLOW_KEY', timeoutMs: 3000000000 } }
      ]));

      const config = loadConfig({ ADVISORS_FILE: file });

      expect(config.advisors).toEqual([]);
      expect(config.rejectedAdvisors).toEqual([
        { index: 0, name: 'Slow', issues: ['config.timeoutMs: Timeout cannot exceed 2147483647 milliseconds.'] }
      ]);
    });

    it('refuses a file that is not an array', () => {
      const file = path.join(dir, 'advisors.json');
      fs.writeFileSync(file, '{"name":"Solo"}');

      expect(() => loadConfig({ ADVISORS_FILE: file })).toThrow(`Advisors file ${file} must contain a JSON array`);
    });

    it('refuses a missing file', () => {
      expect(() => loadConfig({ ADVISORS_FILE: path.join(dir, 'absent.json') })).toThrow(ConfigurationError);
    });
  });
});

describe('validateConfig', () => {
  const base = { rejectedAdvisors: [], defaultTimeoutMs: 1000, nodeEnv: 'test', logLevel: 'info' as const };

  it('rejects duplicate advisor names', () => {
    expect(() => validateConfig({ ...base, advisors: [identity('A'), identity('A', 2000, 'openai')] }))
      .toThrow('Duplicate advisor name: A');
  });

  it('rejects a non-positive timeout', () => {
    expect(() => validateConfig({ ...base, advisors: [identity('A', 0)] })).toThrow('Timeout for A must be a positive integer');
  });

  it('rejects a timeout a timer cannot hold', () => {
    expect(() => validateConfig({ ...base, advisors: [identity('A', 3_000_000_000)] }))
      .toThrow('Timeout for A must be a positive integer up to 2147483647');
  });

  it('rejects an empty advisor list', () => {
    expect(() => validateConfig({ ...base, advisors: [] })).toThrow('No valid advisors are configured');
  });

  it('accepts distinct advisors', () => {
    expect(() => validateConfig({ ...base, advisors: [identity('A'), identity('B')] })).not.toThrow();
  });
});

describe('envCredentialResolver', () => {
  afterEach(() => {
    delete process.env.ADVISORY_TEST_KEY;
  });

  it('reads and trims a credential from the environment', () => {
    process.env.ADVISORY_TEST_KEY = '  test-secret  ';
    expect(envCredentialResolver('ADVISORY_TEST_KEY')).toBe('test-secret');
  });

  it('treats a blank or missing variable as absent', () => {
    expect(envCredentialResolver('ADVISORY_TEST_KEY')).toBeUndefined();
    process.env.ADVISORY_TEST_KEY = '   ';
    expect(envCredentialResolver('ADVISORY_TEST_KEY')).toBeUndefined();
  });
});

describe('bundled examples', () => {
  const examplesDir = path.join(__dirname, '..', '..', 'examples');

  it('ships an advisors file that loads cleanly', () => {
    const config = loadConfig({ ADVISORS_FILE: path.join(examplesDir, 'advisors.example.json') });

    expect(config.advisors.map((advisor) => advisor.name)).toEqual(['Claude', 'Grok', 'Local Llama']);
    expect(config.advisors[1].config.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    expect(config.rejectedAdvisors).toEqual([]);
  });

  it('ships a valid market context', () => {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(examplesDir, 'market-context.example.json'), 'utf8'));

    expect(MarketContextSchema.safeParse(raw).success).toBe(true);
  });
});
