/**
 * env-loader 分层加载器测试
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { config as dotenvConfig } from 'dotenv';

// Mock fs 和 dotenv
vi.mock('fs', () => ({
  existsSync: vi.fn(),
}));

vi.mock('dotenv', () => ({
  config: vi.fn(),
}));

const mockedExistsSync = vi.mocked(existsSync);
const mockedDotenvConfig = vi.mocked(dotenvConfig);

function endsWithAny(...names: string[]) {
  return (path: unknown) => names.some(name => String(path).endsWith(`/${name}`));
}

describe('env-loader 分层加载器', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    vi.resetModules();
    mockedExistsSync.mockReset();
    mockedDotenvConfig.mockReset();
    delete process.env.ANALYSIS_SAG_RATIO;
    delete process.env.ANALYSIS_RMS_WINDOW;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('应该按优先级顺序加载配置文件', async () => {
    process.env.NODE_ENV = 'development';
    mockedExistsSync.mockReturnValue(true);
    mockedDotenvConfig.mockReturnValue({ parsed: {} });

    const mod = await import('../env-loader');

    expect(mod.loadedEnvFiles).toEqual(['.env.development', '.env.local', '.env']);
  });

  it('应该跳过不存在的配置文件', async () => {
    process.env.NODE_ENV = 'development';
    mockedExistsSync.mockImplementation(endsWithAny('.env.development'));
    mockedDotenvConfig.mockReturnValue({ parsed: {} });

    const mod = await import('../env-loader');

    expect(mod.loadedEnvFiles).toEqual(['.env.development']);
  });

  it('production 模式应该加载 .env.production', async () => {
    process.env.NODE_ENV = 'production';
    mockedExistsSync.mockImplementation(endsWithAny('.env.production'));
    mockedDotenvConfig.mockReturnValue({ parsed: {} });

    const mod = await import('../env-loader');

    expect(mod.loadedEnvFiles).toEqual(['.env.production']);
  });

  it('没有任何配置文件时应该返回空数组', async () => {
    process.env.NODE_ENV = 'test';
    mockedExistsSync.mockReturnValue(false);

    const mod = await import('../env-loader');

    expect(mod.loadedEnvFiles).toEqual([]);
    expect(mockedDotenvConfig).not.toHaveBeenCalled();
  });

  it('后加载的文件覆盖先加载的文件', async () => {
    process.env.NODE_ENV = 'test';
    mockedExistsSync.mockImplementation(endsWithAny('.env.test', '.env'));
    mockedDotenvConfig
      .mockReturnValueOnce({ parsed: { ANALYSIS_SAG_RATIO: '0.7' } })
      .mockReturnValueOnce({ parsed: { ANALYSIS_SAG_RATIO: '0.9', ANALYSIS_RMS_WINDOW: '64' } });

    await import('../env-loader');

    expect(process.env.ANALYSIS_SAG_RATIO).toBe('0.9');
    expect(process.env.ANALYSIS_RMS_WINDOW).toBe('64');
  });

  it('进程启动时已存在的变量不被文件覆盖', async () => {
    process.env.NODE_ENV = 'test';
    process.env.ANALYSIS_SAG_RATIO = '0.5';
    mockedExistsSync.mockImplementation(endsWithAny('.env'));
    mockedDotenvConfig.mockReturnValue({ parsed: { ANALYSIS_SAG_RATIO: '0.9' } });

    await import('../env-loader');

    expect(process.env.ANALYSIS_SAG_RATIO).toBe('0.5');
  });

  it('不直接写入 process.env，由加载器合并', async () => {
    process.env.NODE_ENV = 'development';
    mockedExistsSync.mockReturnValue(true);
    mockedDotenvConfig.mockReturnValue({ parsed: {} });

    await import('../env-loader');

    expect(mockedDotenvConfig).toHaveBeenCalledTimes(3);
    for (const call of mockedDotenvConfig.mock.calls) {
      expect(call[0]).toHaveProperty('processEnv', {});
    }
  });

  it('dotenv 解析失败时抛出', async () => {
    process.env.NODE_ENV = 'test';
    mockedExistsSync.mockImplementation(endsWithAny('.env'));
    mockedDotenvConfig.mockReturnValue({ error: new Error('parse failed') });

    await expect(import('../env-loader')).rejects.toThrow('parse failed');
  });
});
