/**
 * Tests for the pipeline.yaml loader
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { clearConfigCache, loadPipelineConfig, parsePipelineConfig } from '../yaml-loader';
import { DEFAULT_PIPELINE } from '../yaml-types';

describe('parsePipelineConfig', () => {
  it('should fill every section with defaults', () => {
    const parsed = parsePipelineConfig({});

    expect(parsed.catalog).toEqual({
      page_size: 50,
      batch_size: 50,
      timeout_ms: 30000,
      retries: { attempts: 4, base_delay_ms: 1000, max_delay_ms: 8000, factor: 2, jitter: 0 }
    });
    expect(parsed.analytics.max_results).toBe(200);
    expect(parsed.backfill.pause_ms).toBe(1000);
  });

  it('should keep overrides and default the rest', () => {
    const parsed = parsePipelineConfig({ catalog: { batch_size: 25, retries: { attempts: 2 } } });

    expect(parsed.catalog.batch_size).toBe(25);
    expect(parsed.catalog.page_size).toBe(50);
    expect(parsed.catalog.retries).toEqual({
      attempts: 2,
      base_delay_ms: 1000,
      max_delay_ms: 8000,
      factor: 2,
      jitter: 0
    });
  });

  it('should reject batches above the upstream limit', () => {
    expect(() => parsePipelineConfig({ catalog: { batch_size: 51 } }, 'test.yaml')).toThrow(
      'Invalid configuration in test.yaml: catalog.batch_size'
    );
  });

  it('should reject jitter outside 0..1', () => {
    expect(() => parsePipelineConfig({ analytics: { retries: { jitter: 250 } } })).toThrow(
      'analytics.retries.jitter'
    );
  });
});

describe('loadPipelineConfig', () => {
  let dir: string;

  beforeEach(async () => {
    clearConfigCache();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should load the shipped pipeline.yaml', async () => {
    const loaded = await loadPipelineConfig(path.resolve(__dirname, '../../../config/pipeline.yaml'));

    expect(loaded).toEqual(DEFAULT_PIPELINE);
  });

  it('should read an explicit file', async () => {
    const file = path.join(dir, 'pipeline.yaml');
    await fs.writeFile(file, 'backfill:\n  pause_ms: 0\n');

    const loaded = await loadPipelineConfig(file);

    expect(loaded.backfill.pause_ms).toBe(0);
    expect(loaded.catalog.batch_size).toBe(50);
  });

  it('should treat an empty file as all defaults', async () => {
    const file = path.join(dir, 'empty.yaml');
    await fs.writeFile(file, '');

    await expect(loadPipelineConfig(file)).resolves.toEqual(DEFAULT_PIPELINE);
  });

  it('should fail on a missing explicit file', async () => {
    await expect(loadPipelineConfig(path.join(dir, 'absent.yaml'))).rejects.toThrow(
      'Missing configuration file'
    );
  });

  it('should fail on malformed YAML', async () => {
    const file = path.join(dir, 'broken.yaml');
    await fs.writeFile(file, 'catalog: [unclosed\n');

    await expect(loadPipelineConfig(file)).rejects.toThrow('Invalid YAML in');
  });
});
