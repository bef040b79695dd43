/**
 * Credentials handed to the request signer.
 * Which fields are needed depends on the signature version.
 */
export interface Credentials {
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
  token?: string;
}

/**
 * Values read from a shared configuration file profile, keyed the way the
 * file spells them (e.g. `parameter_validation`, `s3.addressing_style`).
 */
export type ScopedConfig = Record<string, unknown>;
