/**
 * 线性 RUL 模型与模型加载测试
 */
import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';

vi.mock('../../../core/logger', () => ({
  createModuleLogger: () => ({
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import { loadRulModel, loadRulModelOrNull, parseModelArtifact } from '../rul-model';
import { MissingModelFeatureError, ModelUnavailableError } from '../../../core/errors';
import { modelInputColumns } from '../../feature-extraction/feature-extraction.service';

const MODEL_PATH = fileURLToPath(new URL('../../../../models/rul-model.json', import.meta.url));

describe('LinearRulModel', () => {
  const model = parseModelArtifact({
    feature_names: ['a', 'b'],
    scaler: { mean: [1, 2], scale: [2, 0] },
    coefficients: [3, 4],
    intercept: 10,
  });

  it('intercept + Σ coef · (x - mean) / scale，零方差列不缩放', () => {
    expect(model.predict({ a: 5, b: 3 })).toBe(20);
  });

  it('多余的列被忽略', () => {
    expect(model.predict({ a: 1, b: 2, extra: 99 })).toBe(10);
  });

  it('未指定名称与时间单位时使用默认值', () => {
    expect(model.name).toBe('linear-rul');
    expect(model.timeUnitMinutes).toBeUndefined();
  });

  it('缺少列时抛出 MissingModelFeatureError', () => {
    try {
      model.predict({ a: 1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MissingModelFeatureError);
      if (err instanceof MissingModelFeatureError) {
        expect(err.missing).toEqual(['b']);
        expect(err.message).toBe('Missing features for scaler: b');
        expect(err.httpStatus).toBe(422);
      }
    }
  });

  it('工件各数组长度不一致时拒绝', () => {
    expect(() => parseModelArtifact({
      feature_names: ['a', 'b'],
      scaler: { mean: [0, 0], scale: [1, 1] },
      coefficients: [1],
      intercept: 0,
    })).toThrow('coefficients has 1 entries, expected 2');
  });

  it('工件结构非法时抛出 ModelUnavailableError', () => {
    expect(() => parseModelArtifact({ feature_names: [] })).toThrow(ModelUnavailableError);
  });
});

describe('loadRulModel', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'rul-model-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('仓库自带工件覆盖全部 96 列', async () => {
    const model = await loadRulModel(MODEL_PATH);
    expect(model.featureNames).toEqual(modelInputColumns());
    expect(model.timeUnitMinutes).toBe(10);
  });

  it('相对路径按 baseDir 解析', async () => {
    writeFileSync(join(dir, 'tiny.json'), JSON.stringify({
      name: 'tiny',
      feature_names: ['a'],
      scaler: { mean: [0], scale: [1] },
      coefficients: [2],
      intercept: 1,
    }));
    const model = await loadRulModel('tiny.json', dir);
    expect(model.name).toBe('tiny');
    expect(model.predict({ a: 3 })).toBe(7);
  });

  it('文件不存在时拒绝', async () => {
    await expect(loadRulModel(join(dir, 'missing.json'))).rejects.toBeInstanceOf(ModelUnavailableError);
  });

  it('JSON 非法时拒绝', async () => {
    writeFileSync(join(dir, 'broken.json'), '{ not json');
    await expect(loadRulModel(join(dir, 'broken.json'))).rejects.toThrow('not valid JSON');
  });

  it('loadRulModelOrNull 失败时返回 null', async () => {
    await expect(loadRulModelOrNull(join(dir, 'missing.json'))).resolves.toBeNull();
  });
});
