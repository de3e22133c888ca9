/**
 * AWS Secrets Manager secret provider
 */
import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import type { ISecretProvider } from '../interfaces';

export class SecretsManagerSecretProvider implements ISecretProvider {
  private readonly client: SecretsManagerClient;

  constructor(client: SecretsManagerClient = new SecretsManagerClient({})) {
    this.client = client;
  }

  async getSecret(name: string): Promise<string> {
    const response = await this.client.send(new GetSecretValueCommand({ SecretId: name }));

    if (response.SecretString === undefined) {
      throw new Error(`Secret ${name} has no string value`);
    }

    return response.SecretString;
  }
}
