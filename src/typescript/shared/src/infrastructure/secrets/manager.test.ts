const mockAccessSecretVersion = jest.fn();

jest.mock('@google-cloud/secret-manager', () => ({
  SecretManagerServiceClient: jest.fn().mockImplementation(() => ({
    accessSecretVersion: mockAccessSecretVersion,
  })),
}));

import { getSecret, getOptionalSecret, toSecretId } from './manager';

describe('secrets', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    jest.clearAllMocks();
    process.env = { ...originalEnv };
    delete process.env['MY_SECRET'];
    delete process.env.GOOGLE_CLOUD_PROJECT;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should return env var if set', async () => {
    process.env['MY_SECRET'] = 'test-secret-value';
    await expect(getSecret('MY_SECRET')).resolves.toBe('test-secret-value');
    expect(mockAccessSecretVersion).not.toHaveBeenCalled();
  });

  it('should throw error if env var not set and no project configured', async () => {
    await expect(getSecret('MY_SECRET')).rejects.toThrow('Secret MY_SECRET not found in environment variables');
  });

  it('should return undefined for a missing optional secret', async () => {
    await expect(getOptionalSecret('MY_SECRET')).resolves.toBeUndefined();
  });

  it('should fall back to Secret Manager when a project is configured', async () => {
    process.env.GOOGLE_CLOUD_PROJECT = 'test-project';
    mockAccessSecretVersion.mockResolvedValue([{ payload: { data: Buffer.from('from-manager') } }]);

    await expect(getSecret('MY_SECRET')).resolves.toBe('from-manager');
    expect(mockAccessSecretVersion).toHaveBeenCalledWith({
      name: 'projects/test-project/secrets/my-secret/versions/latest',
    });
  });

  it('should throw when Secret Manager has no payload', async () => {
    process.env.GOOGLE_CLOUD_PROJECT = 'test-project';
    mockAccessSecretVersion.mockResolvedValue([{ payload: null }]);

    await expect(getSecret('MY_SECRET')).rejects.toThrow('Secret MY_SECRET not found');
  });

  it('maps env names to secret ids', () => {
    expect(toSecretId('STRAVA_CLIENT_ID')).toBe('strava-client-id');
  });
});
