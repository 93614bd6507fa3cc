import { SecretManagerServiceClient } from '@google-cloud/secret-manager';

let secretClient: SecretManagerServiceClient | undefined;

/**
 * Secret Manager ids are the kebab-case form of the env var name
 * (STRAVA_CLIENT_ID -> strava-client-id).
 */
export function toSecretId(name: string): string {
  return name.toLowerCase().replace(/_/g, '-');
}

async function readFromSecretManager(projectId: string, name: string): Promise<string | undefined> {
  if (!secretClient) {
    secretClient = new SecretManagerServiceClient();
  }
  const [version] = await secretClient.accessSecretVersion({
    name: `projects/${projectId}/secrets/${toSecretId(name)}/versions/latest`,
  });
  const data = version.payload?.data;
  if (!data) {
    return undefined;
  }
  return typeof data === 'string' ? data : Buffer.from(data).toString('utf-8');
}

/**
 * Reads a secret, preferring the environment variable of the same name.
 * Secrets are injected as environment variables at deploy time; Secret Manager is
 * only consulted when the variable is absent and GOOGLE_CLOUD_PROJECT is set.
 * @throws Error if the secret is found in neither place.
 */
export async function getSecret(name: string): Promise<string> {
  const value = await getOptionalSecret(name);

  if (!value) {
    throw new Error(`Secret ${name} not found in environment variables`);
  }

  return value;
}

export async function getOptionalSecret(name: string): Promise<string | undefined> {
  const fromEnv = process.env[name];
  if (fromEnv) {
    return fromEnv;
  }

  const projectId = process.env.GOOGLE_CLOUD_PROJECT;
  if (!projectId) {
    return undefined;
  }

  return readFromSecretManager(projectId, name);
}
