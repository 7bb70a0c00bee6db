import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError } from '../../utils/errors.js';
import { loadPipelineConfig, loadPipelineConfigFromEnvFile } from '../pipelineConfig.js';

describe('loadPipelineConfig', () => {
  test('uses defaults relative to the base directory', () => {
    expect(loadPipelineConfig({}, '/base')).toEqual({
      categoryMappingsPath: '/base/data/category_mappings.json',
      variantSchemaPath: '/base/data/variant_extractions.json',
      reportDir: '/base/reports',
      categoryPath: { prefix: 'Tovary a kategórie', separator: '/', delimiter: ' > ' },
      resolverTimeoutMs: undefined,
      grouping: { minBaseNameLength: 8, similarityThreshold: 0.98, minLengthRatio: 0.5 },
      excludedManufacturers: ['Liebherr'],
      overrideConflicts: true,
    });
  });

  test('reads overrides and treats blank values as unset', () => {
    const config = loadPipelineConfig(
      {
        REPORT_DIR: '/tmp/out',
        CATEGORY_DELIMITER: ' / ',
        CATEGORY_PREFIX: '',
        CATEGORY_RESOLVER_TIMEOUT_MS: '1500',
        VARIANT_EXCLUDED_MANUFACTURERS: ' Liebherr , Rational ,',
        VARIANT_OVERRIDE_CONFLICTS: 'no',
      },
      '/base'
    );

    expect(config.reportDir).toBe('/tmp/out');
    expect(config.categoryPath).toEqual({ prefix: 'Tovary a kategórie', separator: '/', delimiter: ' / ' });
    expect(config.resolverTimeoutMs).toBe(1500);
    expect(config.excludedManufacturers).toEqual(['Liebherr', 'Rational']);
    expect(config.overrideConflicts).toBe(false);
  });

  test('rejects invalid values', () => {
    expect(() => loadPipelineConfig({ VARIANT_SIMILARITY_THRESHOLD: 'abc' }, '/base')).toThrow(ConfigurationError);
    expect(() => loadPipelineConfig({ VARIANT_SIMILARITY_THRESHOLD: '1.5' }, '/base')).toThrow(
      /VARIANT_SIMILARITY_THRESHOLD/
    );
    expect(() => loadPipelineConfig({ VARIANT_OVERRIDE_CONFLICTS: 'maybe' }, '/base')).toThrow(ConfigurationError);
  });
});

describe('loadPipelineConfigFromEnvFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-env-'));
  });

  afterEach(() => {
    delete process.env.VARIANT_MIN_BASE_NAME_LENGTH;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('loads variables from the env file', () => {
    const envFile = path.join(dir, '.env');
    fs.writeFileSync(envFile, 'VARIANT_MIN_BASE_NAME_LENGTH=12\n', 'utf-8');

    expect(loadPipelineConfigFromEnvFile(envFile).grouping.minBaseNameLength).toBe(12);
  });
});
