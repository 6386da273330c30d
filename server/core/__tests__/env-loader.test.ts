/**
 * env-loader 分层加载器测试
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { config as dotenvConfig } from 'dotenv';

vi.mock('fs', () => ({
  existsSync: vi.fn(),
}));

vi.mock('dotenv', () => ({
  config: vi.fn(),
}));

const mockedExistsSync = vi.mocked(existsSync);
const mockedDotenvConfig = vi.mocked(dotenvConfig);

describe('env-loader 分层加载器', () => {
  beforeEach(() => {
    vi.resetModules();
    mockedExistsSync.mockReset();
    mockedDotenvConfig.mockReset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('按优先级顺序加载配置文件', async () => {
    vi.stubEnv('NODE_ENV', 'development');
    mockedExistsSync.mockReturnValue(true);
    mockedDotenvConfig.mockReturnValue({ parsed: {} });

    const mod = await import('../env-loader');

    expect(mod.loadedEnvFiles).toEqual(['.env.development', '.env.local', '.env']);
  });

  it('跳过不存在的配置文件', async () => {
    vi.stubEnv('NODE_ENV', 'development');
    mockedExistsSync.mockImplementation(path => String(path).endsWith('.env.development'));
    mockedDotenvConfig.mockReturnValue({ parsed: {} });

    const mod = await import('../env-loader');

    expect(mod.loadedEnvFiles).toEqual(['.env.development']);
  });

  it('production 模式加载 .env.production', async () => {
    vi.stubEnv('NODE_ENV', 'production');
    mockedExistsSync.mockImplementation(path => String(path).endsWith('.env.production'));
    mockedDotenvConfig.mockReturnValue({ parsed: {} });

    const mod = await import('../env-loader');

    expect(mod.loadedEnvFiles).toEqual(['.env.production']);
  });

  it('没有任何配置文件时返回空数组', async () => {
    vi.stubEnv('NODE_ENV', 'test');
    mockedExistsSync.mockReturnValue(false);

    const mod = await import('../env-loader');

    expect(mod.loadedEnvFiles).toEqual([]);
    expect(mockedDotenvConfig).not.toHaveBeenCalled();
  });

  it('dotenv 只解析不写入，由加载器合并到 process.env', async () => {
    vi.stubEnv('NODE_ENV', 'test');
    mockedExistsSync.mockImplementation(path => String(path).endsWith('.env'));
    mockedDotenvConfig.mockReturnValue({ parsed: { RUL_LOADER_TEST_KEY: 'from-file' } });

    await import('../env-loader');

    expect(mockedDotenvConfig).toHaveBeenCalledTimes(1);
    expect(mockedDotenvConfig.mock.calls[0]?.[0]).toHaveProperty('processEnv', {});
    expect(process.env.RUL_LOADER_TEST_KEY).toBe('from-file');
    delete process.env.RUL_LOADER_TEST_KEY;
  });

  it('启动前已存在的环境变量不被覆盖', async () => {
    vi.stubEnv('NODE_ENV', 'test');
    vi.stubEnv('PORT', '5001');
    mockedExistsSync.mockReturnValue(true);
    mockedDotenvConfig.mockReturnValue({ parsed: { PORT: '9000' } });

    await import('../env-loader');

    expect(process.env.PORT).toBe('5001');
  });

  it('后加载的文件覆盖先加载的文件', async () => {
    vi.stubEnv('NODE_ENV', 'test');
    mockedExistsSync.mockReturnValue(true);
    mockedDotenvConfig
      .mockReturnValueOnce({ parsed: { RUL_LOADER_LAYER: 'env-file' } })
      .mockReturnValueOnce({ parsed: { RUL_LOADER_LAYER: 'local' } })
      .mockReturnValueOnce({ parsed: { RUL_LOADER_LAYER: 'dotenv' } });

    await import('../env-loader');

    expect(process.env.RUL_LOADER_LAYER).toBe('dotenv');
    delete process.env.RUL_LOADER_LAYER;
  });
});
