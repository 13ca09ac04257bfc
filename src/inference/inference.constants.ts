/**
 * Injection token for OpenAI client.
 */
export const OPENAI_CLIENT = Symbol('OPENAI_CLIENT');

/**
 * Injection token for the inference collaborator.
 *
 * @example
 * constructor(@Inject(INFERENCE_SERVICE) private readonly inference: IInferenceService) {}
 */
export const INFERENCE_SERVICE = Symbol('INFERENCE_SERVICE');

/**
 * Injection token for the embedding collaborator used by menu similarity search.
 */
export const EMBEDDING_SERVICE = Symbol('EMBEDDING_SERVICE');

/**
 * Request settings shared by every stage.
 */
export const INFERENCE_DEFAULTS = {
  TEMPERATURE: 0.3,
  MAX_TOKENS: 800,
  /** Inputs per embeddings request */
  EMBEDDING_BATCH_SIZE: 100,
} as const;
