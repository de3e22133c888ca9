/**
 * Abstract interface for secret storage
 */
export interface ISecretProvider {
  /**
   * Read a secret string by name. Throws when the secret cannot be read.
   */
  getSecret(name: string): Promise<string>;
}
