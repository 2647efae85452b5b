import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import {
  ConfigError,
  DEFAULT_RECONCILER_CONFIG,
  createReconcilerConfig,
  loadBrandVocabulary,
  loadEnv,
  reconcilerConfigFromEnv,
} from '../src/config';

describe('Configuration', () => {
  describe('loadEnv', () => {
    it('should apply defaults to an empty environment', () => {
      const env = loadEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.PORT).toBe(3000);
      expect(env.API_PREFIX).toBe('/api/v1');
      expect(env.CORS_ORIGIN).toEqual(['*']);
      expect(env.CATALOG_STARTUP_CHECK).toBe(true);
      expect(env.TOP_N).toBe(20);
    });

    it('should coerce numbers and booleans', () => {
      const env = loadEnv({ PORT: '8080', CATALOG_STARTUP_CHECK: '0', SCORE_THRESHOLD: '0.6' });

      expect(env.PORT).toBe(8080);
      expect(env.CATALOG_STARTUP_CHECK).toBe(false);
      expect(env.SCORE_THRESHOLD).toBe(0.6);
    });

    it('should split CORS origins', () => {
      const env = loadEnv({ CORS_ORIGIN: 'http://a.test, http://b.test,' });

      expect(env.CORS_ORIGIN).toEqual(['http://a.test', 'http://b.test']);
    });

    it('should throw ConfigError naming the bad variable', () => {
      expect(() => loadEnv({ PORT: 'abc' })).toThrow(ConfigError);
      expect(() => loadEnv({ PORT: 'abc' })).toThrow(/PORT/);
    });

    it('should return a frozen object', () => {
      expect(Object.isFrozen(loadEnv({}))).toBe(true);
    });
  });

  describe('createReconcilerConfig', () => {
    it('should return the defaults without overrides', () => {
      expect(createReconcilerConfig()).toEqual(DEFAULT_RECONCILER_CONFIG);
    });

    it('should apply overrides', () => {
      const config = createReconcilerConfig({ scoreThreshold: 0.6, topN: 5 });

      expect(config.scoreThreshold).toBe(0.6);
      expect(config.topN).toBe(5);
      expect(config.autoMatchThreshold).toBe(0.8);
    });

    it('should reject an auto-match threshold at or below the score threshold', () => {
      expect(() => createReconcilerConfig({ scoreThreshold: 0.8, autoMatchThreshold: 0.8 })).toThrow(
        'autoMatchThreshold must be greater than scoreThreshold'
      );
    });

    it('should reject topN outside 5..30', () => {
      expect(() => createReconcilerConfig({ topN: 4 })).toThrow(ConfigError);
      expect(() => createReconcilerConfig({ topN: 31 })).toThrow(ConfigError);
    });

    it('should reject more than two retries', () => {
      expect(() => createReconcilerConfig({ retryCount: 3 })).toThrow(ConfigError);
    });

    it('should reject a zero concurrency limit', () => {
      expect(() => createReconcilerConfig({ concurrencyLimit: 0 })).toThrow(ConfigError);
    });

    it('should freeze the configuration and its brand list', () => {
      const config = createReconcilerConfig({ brandVocabulary: ['acme'] });

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.brandVocabulary)).toBe(true);
    });
  });

  describe('brand vocabulary', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(path.join(tmpdir(), 'config-test-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should load a JSON array of brands', () => {
      const file = path.join(dir, 'brands.json');
      writeFileSync(file, JSON.stringify(['acme', 'globex']));

      expect(loadBrandVocabulary(file)).toEqual(['acme', 'globex']);
    });

    it('should throw ConfigError for a missing file', () => {
      expect(() => loadBrandVocabulary(path.join(dir, 'missing.json'))).toThrow(ConfigError);
    });

    it('should throw ConfigError for a non-array payload', () => {
      const file = path.join(dir, 'brands.json');
      writeFileSync(file, JSON.stringify({ brands: ['acme'] }));

      expect(() => loadBrandVocabulary(file)).toThrow('must be an array of strings');
    });

    it('should build the engine configuration from the environment', () => {
      const file = path.join(dir, 'brands.json');
      writeFileSync(file, JSON.stringify(['acme']));

      const config = reconcilerConfigFromEnv(
        loadEnv({ BRAND_VOCABULARY_PATH: file, TOP_N: '10', CATALOG_RETRY_COUNT: '1' })
      );

      expect(config.topN).toBe(10);
      expect(config.retryCount).toBe(1);
      expect(config.brandVocabulary).toEqual(['acme']);
    });

    it('should ship a default vocabulary', () => {
      const brands = loadBrandVocabulary(loadEnv({}).BRAND_VOCABULARY_PATH);

      expect(brands.length).toBeGreaterThan(0);
      expect(brands).toContain('barilla');
    });
  });
});
