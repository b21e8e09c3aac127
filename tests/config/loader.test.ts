import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ZodError } from 'zod';
import { loadConfigFile, parseConfig, parseCookies } from '../../src/config/loader.js';

const YAML_CONFIG = [
  'baseUrl: https://shop.test',
  'tests:',
  '  - name: checkout',
  '    prompt: Buy the first item and check the cart total',
  '',
].join('\n');

describe('parseConfig', () => {
  it('fills defaults for a minimal YAML file', () => {
    const config = parseConfig(YAML_CONFIG, 'yaml');

    expect(config.baseUrl).toBe('https://shop.test');
    expect(config.maxSteps).toBe(40);
    expect(config.headless).toBe(false);
    expect(config.timeout).toBe(300);
    expect(config.concurrency).toBe(1);
    expect(config.tests).toEqual([
      { name: 'checkout', prompt: 'Buy the first item and check the cart total' },
    ]);
  });

  it('reads JSON with explicit values', () => {
    const config = parseConfig(
      JSON.stringify({
        baseUrl: 'https://shop.test',
        headless: true,
        provider: 'mock',
        concurrency: 3,
        auth: { cookie: 'session=test-secret' },
        tests: [{ name: 'home', prompt: 'Open the home page', url: 'https://shop.test/home' }],
      }),
      'json',
    );

    expect(config.headless).toBe(true);
    expect(config.provider).toBe('mock');
    expect(config.concurrency).toBe(3);
    expect(config.auth?.cookie).toBe('session=test-secret');
    expect(config.tests[0]?.url).toBe('https://shop.test/home');
  });

  it('rejects a config without tests', () => {
    expect(() => parseConfig('baseUrl: https://shop.test\ntests: []\n', 'yaml')).toThrow(ZodError);
  });

  it('rejects an unknown provider', () => {
    expect(() => parseConfig(`${YAML_CONFIG}provider: gemini\n`, 'yaml')).toThrow(ZodError);
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'webqa-config-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads .webqa.yaml from disk', async () => {
    const file = path.join(dir, '.webqa.yaml');
    await writeFile(file, YAML_CONFIG, 'utf-8');

    const config = await loadConfigFile(file);
    expect(config.tests[0]?.name).toBe('checkout');
  });

  it('treats .json files as JSON', async () => {
    const file = path.join(dir, 'webqa.json');
    await writeFile(file, '{"baseUrl":"https://shop.test","tests":[{"name":"a","prompt":"b"}]}', 'utf-8');

    const config = await loadConfigFile(file);
    expect(config.tests[0]?.prompt).toBe('b');
  });
});

describe('parseCookies', () => {
  it('splits name=value pairs and skips malformed ones', () => {
    expect(parseCookies('session=test-secret; theme=dark; broken; =orphan', 'https://shop.test/')).toEqual([
      { name: 'session', value: 'test-secret', url: 'https://shop.test/' },
      { name: 'theme', value: 'dark', url: 'https://shop.test/' },
    ]);
  });

  it('keeps everything after the first equals sign', () => {
    expect(parseCookies('token=a=b', 'https://shop.test/')).toEqual([
      { name: 'token', value: 'a=b', url: 'https://shop.test/' },
    ]);
  });
});
