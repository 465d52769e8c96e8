/**
 * Request signing module.
 *
 * @module signing
 */

export {
  RequestSigner,
  SIGNATURE_VERSIONS,
  SIGNER_HANDLER_ID,
  isSignatureVersion,
} from './signer.js';
export type { RequestSignerOptions, SignatureVersion } from './signer.js';
export { SigningKeyCache } from './cache.js';
export {
  signV4,
  deriveSigningKey,
  formatDate,
  formatDateTime,
  getSigningKeyCache,
  sha256Hex,
} from './v4.js';
export type { SigV4Params } from './v4.js';
export {
  uriEncode,
  canonicalPath,
  canonicalQueryString,
  canonicalHeaders,
  shouldSignHeader,
} from './canonical.js';
