import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadStabilityConfigFile } from '../../src/config/stability-config-file';
import { DEFAULT_POLICY, createPolicy } from '../../src/config/stability-policy';

describe('createPolicy', () => {
  it('should apply defaults', () => {
    const policy = createPolicy();
    expect(policy.enabled).toBe(true);
    expect(policy.ignoredTypePatterns).toEqual([]);
    expect(policy.customStableTypePatterns).toEqual([]);
    expect(policy.treatUnstableAsIdentityComparable).toBe(false);
    expect(policy.maxRecursionDepth).toBe(DEFAULT_POLICY.maxRecursionDepth);
  });

  it('should be frozen', () => {
    const policy = createPolicy({ ignoredTypePatterns: ['com.example.*'] });
    expect(Object.isFrozen(policy)).toBe(true);
    expect(Object.isFrozen(policy.ignoredTypePatterns)).toBe(true);
  });

  it('should replace an invalid recursion depth with the default', () => {
    expect(createPolicy({ maxRecursionDepth: 0 }).maxRecursionDepth).toBe(64);
    expect(createPolicy({ maxRecursionDepth: 2.5 }).maxRecursionDepth).toBe(64);
    expect(createPolicy({ maxRecursionDepth: 5 }).maxRecursionDepth).toBe(5);
  });

  it('should match ignored and custom stable patterns', () => {
    const policy = createPolicy({
      ignoredTypePatterns: ['com.example.generated.**'],
      customStableTypePatterns: ['com.example.Money'],
    });
    expect(policy.isIgnored('com.example.generated.api.Dto')).toBe(true);
    expect(policy.isIgnored('com.example.Money')).toBe(false);
    expect(policy.isCustomStable('com.example.Money')).toBe(true);
    expect(policy.isCustomStable(undefined)).toBe(false);
  });

  it('should ignore every named type when checking is disabled', () => {
    const policy = createPolicy({ enabled: false });
    expect(policy.isIgnored('com.example.Anything')).toBe(true);
    expect(policy.isIgnored(undefined)).toBe(false);
  });
});

describe('loadStabilityConfigFile', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stability-config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should read one pattern per line', async () => {
    const configPath = path.join(tempDir, 'stability.conf');
    await fs.writeFile(configPath, '# value types\ncom.example.Money\n\ncom.example.ui.**\n');

    await expect(loadStabilityConfigFile(configPath)).resolves.toEqual(['com.example.Money', 'com.example.ui.**']);
  });

  it('should return no patterns for a missing file', async () => {
    await expect(loadStabilityConfigFile(path.join(tempDir, 'missing.conf'))).resolves.toEqual([]);
  });

  it('should return no patterns without a path', async () => {
    await expect(loadStabilityConfigFile(undefined)).resolves.toEqual([]);
  });
});
