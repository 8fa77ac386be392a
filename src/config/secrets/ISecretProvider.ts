/**
 * Secret Provider Interface
 *
 * A provider looks up a logical secret name (e.g. "IDENTITY_API_KEY_SECRET")
 * in one source. Providers are chained by SecretResolver in priority order.
 */

export interface ISecretProvider {
  /**
   * Resolve `logicalName` from this provider's source.
   *
   * @returns The secret, or undefined when this source does not have it
   * @throws Only for unexpected failures; "not found" is `undefined`
   */
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(value: unknown): value is ISecretProvider {
  return (
    typeof value === 'object' &&
    value !== null &&
    'resolve' in value &&
    typeof value.resolve === 'function'
  );
}
