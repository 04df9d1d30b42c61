/**
 * @clientkey/authn-apikey
 *
 * API key credentials for OAuth2 client_credentials exchange.
 *
 * An issued key is a self-describing artifact carrying the client id, the
 * argon2id parameters, the salt and the secret. Only the argon2id-derived key
 * is stored; verification re-derives it from the presented secret.
 */

export {
  AlgorithmParser,
  AlgorithmSpec,
  parseAlgorithm,
  boundsFromConfig,
  ALGORITHM_ID,
  DEFAULT_ALGORITHM,
  DEFAULT_BOUNDS,
  type AlgorithmBounds,
  type Range,
} from './algorithm.js';
export {
  KeyMaterial,
  DEFAULT_SALT_LENGTH,
  DEFAULT_SECRET_LENGTH,
  type GeneratedKeyMaterial,
  type KeyMaterialOptions,
  type RandomSource,
} from './keys.js';
export {
  ArtifactCodec,
  DEFAULT_DISPLAY_NAME_MAX_LENGTH,
  type ArtifactCodecOptions,
  type ArtifactFields,
  type EncodeInput,
} from './codec.js';
export { generateClientId, DEFAULT_CLIENT_ID_LENGTH, type IdGenerator } from './client-id.js';
export {
  ApiKeyIssuer,
  encodeDerivedKey,
  type ApiKeyIssuerOptions,
  type CredentialStore,
  type IssueRequest,
  type IssuedApiKey,
  type StoredCredential,
  type VerificationResult,
} from './issuer.js';
export * from './errors.js';

// Utilities
export { encodeBase64Url, decodeBase64Url } from './utils/base64url.js';
