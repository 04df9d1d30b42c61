/**
 * Artifact codec
 *
 * Turns an issued credential into the single opaque string handed to the
 * caller, and back. Two layouts share the same pipeline:
 *
 *   display_name_tagged  base64url(name.clientid.alg.base64url(salt).base64url(secret))
 *   basic_auth           base64url(clientid:alg.base64url(salt).base64url(secret))
 *
 * basic_auth keeps the clientid:secret shape of an "Authorization: Basic"
 * header for client_credentials token endpoints; it carries no display name.
 *
 * Every artifact names its own algorithm parameters, so keys issued under
 * older cost settings stay verifiable after the default changes.
 */

import type { CodecLayoutName } from '@clientkey/core';
import { AlgorithmParser, type AlgorithmSpec } from './algorithm.js';
import { InvalidFieldError, MalformedArtifactError } from './errors.js';
import { decodeBase64Url, encodeBase64Url } from './utils/base64url.js';
import { splitN } from './utils/split.js';

export const DEFAULT_DISPLAY_NAME_MAX_LENGTH = 16;

export interface ArtifactFields {
  clientId: string;
  /** Empty when the layout does not carry one */
  displayName: string;
  algorithm: AlgorithmSpec;
  salt: Buffer;
  secret: Buffer;
}

export type EncodeInput = Omit<ArtifactFields, 'displayName' | 'salt' | 'secret'> & {
  displayName?: string;
  salt: Uint8Array;
  secret: Uint8Array;
};

/**
 * Text fields of an artifact before the algorithm and byte fields are parsed
 */
interface RawFields {
  displayName: string;
  clientId: string;
  descriptor: string;
  salt: string;
  secret: string;
}

interface Layout {
  /** Characters that must not appear in caller-supplied fields */
  readonly reserved: readonly string[];
  readonly carriesDisplayName: boolean;
  join(fields: RawFields): string;
  /** @throws MalformedArtifactError */
  split(text: string): RawFields;
}

const FIELD_SEPARATOR = '.';

/** A UTF-16 surrogate without its partner; UTF-8 encoding would turn it into U+FFFD */
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const displayNameTagged: Layout = {
  reserved: [FIELD_SEPARATOR],
  carriesDisplayName: true,
  join: fields =>
    [fields.displayName, fields.clientId, fields.descriptor, fields.salt, fields.secret].join(
      FIELD_SEPARATOR
    ),
  split: text => {
    const parts = splitN(text, FIELD_SEPARATOR, 5);
    const [displayName, clientId, descriptor, salt, secret] = parts;
    if (
      displayName === undefined ||
      clientId === undefined ||
      descriptor === undefined ||
      salt === undefined ||
      secret === undefined
    ) {
      throw new MalformedArtifactError(parts.length, 5);
    }
    return { displayName, clientId, descriptor, salt, secret };
  },
};

const CLIENT_SEPARATOR = ':';

const basicAuth: Layout = {
  reserved: [CLIENT_SEPARATOR],
  carriesDisplayName: false,
  join: fields =>
    [fields.clientId, [fields.descriptor, fields.salt, fields.secret].join(FIELD_SEPARATOR)].join(
      CLIENT_SEPARATOR
    ),
  split: text => {
    // The descriptor itself contains ':', so only the first one separates the client id
    const outer = splitN(text, CLIENT_SEPARATOR, 2);
    const [clientId, secretPart] = outer;
    if (clientId === undefined || secretPart === undefined) {
      throw new MalformedArtifactError(outer.length, 2, 'client id and secret');
    }
    const parts = splitN(secretPart, FIELD_SEPARATOR, 4);
    const [descriptor, salt, secret] = parts;
    if (
      parts.length !== 3 ||
      descriptor === undefined ||
      salt === undefined ||
      secret === undefined
    ) {
      throw new MalformedArtifactError(parts.length, 3, 'secret');
    }
    return { displayName: '', clientId, descriptor, salt, secret };
  },
};

const LAYOUTS: Record<CodecLayoutName, Layout> = {
  display_name_tagged: displayNameTagged,
  basic_auth: basicAuth,
};

export interface ArtifactCodecOptions {
  layout?: CodecLayoutName;
  displayNameMaxLength?: number;
  /** Parser used on decode; its bounds decide which embedded parameters are accepted */
  parser?: AlgorithmParser;
}

export class ArtifactCodec {
  readonly layoutName: CodecLayoutName;
  private readonly layout: Layout;
  private readonly displayNameMaxLength: number;
  private readonly parser: AlgorithmParser;

  constructor(options: ArtifactCodecOptions = {}) {
    this.layoutName = options.layout ?? 'display_name_tagged';
    this.layout = LAYOUTS[this.layoutName];
    this.displayNameMaxLength = options.displayNameMaxLength ?? DEFAULT_DISPLAY_NAME_MAX_LENGTH;
    this.parser = options.parser ?? new AlgorithmParser();
  }

  /**
   * Encode an issued credential for delivery
   *
   * @throws InvalidFieldError if clientId or displayName contains a reserved separator
   *   or a lone surrogate
   */
  encode(input: EncodeInput): string {
    const displayName = this.layout.carriesDisplayName
      ? truncate(input.displayName ?? '', this.displayNameMaxLength)
      : '';

    this.checkField('clientId', input.clientId);
    this.checkField('displayName', displayName);

    const joined = this.layout.join({
      displayName,
      clientId: input.clientId,
      descriptor: input.algorithm.render(),
      salt: encodeBase64Url(input.salt),
      secret: encodeBase64Url(input.secret),
    });
    return encodeBase64Url(Buffer.from(joined, 'utf-8'));
  }

  private checkField(field: 'clientId' | 'displayName', value: string): void {
    for (const separator of this.layout.reserved) {
      if (value.includes(separator)) {
        throw new InvalidFieldError(field, `must not contain '${separator}'`, { separator });
      }
    }
    if (LONE_SURROGATE.test(value)) {
      throw new InvalidFieldError(field, 'is not well-formed UTF-16 (lone surrogate)');
    }
  }

  /**
   * Recover the fields of a presented artifact
   *
   * @throws InvalidEncodingError if the artifact, salt or secret is not padded base64url
   * @throws MalformedArtifactError if the field count is wrong
   * @throws UnsupportedAlgorithmError, MalformedDescriptorError, OutOfRangeError from the descriptor
   */
  decode(artifact: string): ArtifactFields {
    const text = decodeBase64Url(artifact, 'artifact').toString('utf-8');
    const raw = this.layout.split(text);
    const algorithm = this.parser.parse(raw.descriptor);
    const salt = decodeBase64Url(raw.salt, 'salt');
    const secret = decodeBase64Url(raw.secret, 'secret');

    return {
      clientId: raw.clientId,
      displayName: raw.displayName,
      algorithm,
      salt,
      secret,
    };
  }
}

/**
 * Truncate to at most max code points
 */
export function truncate(text: string, max: number): string {
  const codePoints = Array.from(text);
  return codePoints.length <= max ? text : codePoints.slice(0, max).join('');
}
