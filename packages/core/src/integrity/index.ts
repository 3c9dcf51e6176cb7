export {
  DIGEST_ALGORITHMS,
  compareStrength,
  createDigest,
  formatDigest,
  isDigestAlgorithm,
  parseDigest,
  parseSri,
  sameDigest,
  splitUrlDigest,
  strongestAlgorithm,
  toSri,
  type Digest,
  type DigestAlgorithm,
  type DigestPolicy,
} from "./digest.js";
export {
  DigestTransform,
  algorithmsFor,
  assertVerifiable,
  checkDigests,
  verify,
  type VerifiedDigest,
} from "./verify.js";
export { assertGoModHash, assertModuleZipHash, hash1, hashGoMod, hashModuleZip } from "./dirhash.js";
