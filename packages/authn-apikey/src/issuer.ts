/**
 * API key issuance and verification
 *
 * issue():  parse algorithm → generate key material → encode artifact
 * verify(): decode artifact → look up record by client id → match secret
 *
 * Security requirements:
 * - The secret is returned once, inside the artifact, and never stored
 * - Verification has a single failure outcome (no oracle on which step failed)
 * - Unknown client ids still pay for a full derivation
 * - Derived key comparison is constant-time (KeyMaterial.match)
 */

import { defaultConfig, logger, type ApiKeyConfig } from '@clientkey/core';
import { AlgorithmParser, boundsFromConfig } from './algorithm.js';
import { ArtifactCodec, truncate, type ArtifactFields } from './codec.js';
import { generateClientId, type IdGenerator } from './client-id.js';
import { KeyMaterial, type RandomSource } from './keys.js';
import { decodeBase64Url, encodeBase64Url } from './utils/base64url.js';

/**
 * Durable half of an issued credential
 *
 * Lookup key is client_id. derived_key is unique per credential and is the
 * record's primary key in the store.
 */
export interface StoredCredential {
  client_id: string;
  display_name: string;
  /** Descriptor text exactly as embedded in the artifact */
  algorithm: string;
  /** base64url */
  salt: string;
  /** base64url */
  derived_key: string;
}

/**
 * Storage collaborator. This package only reads through it.
 */
export interface CredentialStore {
  findByClientId(clientId: string): Promise<StoredCredential | undefined>;
}

export interface IssueRequest {
  /** Generated when absent or empty */
  clientId?: string;
  displayName?: string;
  /** Descriptor; config default_algorithm when absent */
  algorithm?: string;
}

export interface IssuedApiKey {
  client_id: string;
  /** Opaque artifact - shown only once */
  api_key: string;
  /** What the caller persists */
  record: StoredCredential;
}

export type VerificationResult =
  | { authenticated: true; clientId: string }
  | { authenticated: false };

export interface ApiKeyIssuerOptions {
  idGenerator?: IdGenerator;
  randomSource?: RandomSource;
}

const NOT_AUTHENTICATED: VerificationResult = { authenticated: false };

export class ApiKeyIssuer {
  readonly parser: AlgorithmParser;
  readonly keyMaterial: KeyMaterial;
  readonly codec: ArtifactCodec;
  private readonly idGenerator: IdGenerator;

  constructor(
    private readonly config: ApiKeyConfig = defaultConfig(),
    options: ApiKeyIssuerOptions = {}
  ) {
    this.parser = new AlgorithmParser(boundsFromConfig(config));
    this.keyMaterial = new KeyMaterial({
      saltLength: config.salt_length,
      secretLength: config.secret_length,
      randomSource: options.randomSource,
    });
    this.codec = new ArtifactCodec({
      layout: config.layout,
      displayNameMaxLength: config.display_name_max_length,
      parser: this.parser,
    });
    this.idGenerator = options.idGenerator ?? generateClientId;
  }

  /**
   * Mint a new credential
   *
   * @throws UnsupportedAlgorithmError, MalformedDescriptorError, OutOfRangeError on a bad descriptor
   * @throws InsufficientEntropyError if the random source runs short
   * @throws InvalidFieldError if clientId or displayName contains a separator or lone surrogate
   */
  async issue(request: IssueRequest = {}): Promise<IssuedApiKey> {
    const algorithm = this.parser.parse(request.algorithm ?? this.config.default_algorithm);
    const clientId =
      request.clientId && request.clientId.length > 0
        ? request.clientId
        : this.idGenerator(this.config.client_id_length);

    const { salt, secret, derivedKey } = await this.keyMaterial.generate(algorithm);
    const apiKey = this.codec.encode({
      clientId,
      displayName: request.displayName,
      algorithm,
      salt,
      secret,
    });

    logger.info(`[authn-apikey] Issued credential for client ${clientId} (${algorithm.render()})`);

    return {
      client_id: clientId,
      api_key: apiKey,
      record: {
        client_id: clientId,
        display_name:
          this.codec.layoutName === 'display_name_tagged'
            ? truncate(request.displayName ?? '', this.config.display_name_max_length)
            : '',
        algorithm: algorithm.render(),
        salt: encodeBase64Url(salt),
        derived_key: encodeDerivedKey(derivedKey),
      },
    };
  }

  /**
   * Verify a presented artifact against the store
   *
   * Every failure, from a garbled artifact to a wrong secret, returns the same
   * { authenticated: false }. The reason is logged at debug level only.
   * Store errors propagate.
   */
  async verify(apiKey: string, store: CredentialStore): Promise<VerificationResult> {
    let fields: ArtifactFields;
    try {
      fields = this.codec.decode(apiKey);
    } catch (error) {
      logger.debug(`[authn-apikey] Rejected artifact: ${describeError(error)}`);
      return NOT_AUTHENTICATED;
    }

    const record = await store.findByClientId(fields.clientId);

    if (!record) {
      // Same derivation cost as a known client
      await this.keyMaterial.match(
        fields.secret,
        Buffer.alloc(fields.algorithm.outputLen),
        fields.salt,
        fields.algorithm
      );
      logger.debug(`[authn-apikey] Unknown client ${fields.clientId}`);
      return NOT_AUTHENTICATED;
    }

    let storedKey: Buffer;
    try {
      storedKey = decodeBase64Url(record.derived_key, 'derived_key');
    } catch (error) {
      logger.warn(
        `[authn-apikey] Stored record for client ${record.client_id} is corrupt: ${describeError(error)}`
      );
      return NOT_AUTHENTICATED;
    }

    const matched = await this.keyMaterial.match(
      fields.secret,
      storedKey,
      fields.salt,
      fields.algorithm
    );
    if (!matched) {
      logger.debug(`[authn-apikey] Secret mismatch for client ${fields.clientId}`);
      return NOT_AUTHENTICATED;
    }

    return { authenticated: true, clientId: fields.clientId };
  }
}

/**
 * base64url form of a derived key, used as the stored record's primary key
 */
export function encodeDerivedKey(derivedKey: Uint8Array): string {
  return encodeBase64Url(derivedKey);
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? `${error.code}: ` : '';
    return `${code}${error.message}`;
  }
  return String(error);
}
