/**
 * Lifecycle contract implemented once per backing service.
 *
 * A driver is stateless with respect to the instances it produces: all state
 * lives in the returned instance, so the same driver can be registered in
 * several containers.
 */
export interface ResourceDriver<TInstance, TConfig> {
  /**
   * Create and verify a ready-to-use instance. Throws ConfigurationError for
   * unusable options; any other error means the backing service was not reachable.
   */
  initialize(config: TConfig): Promise<TInstance>;

  cleanup(instance: TInstance): Promise<void>;

  healthCheck(instance: TInstance): Promise<boolean>;

  /**
   * Recognise an instance published by another container in shared state.
   */
  isInstance(candidate: unknown): candidate is TInstance;
}
