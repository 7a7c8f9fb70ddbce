export {
  serializeCoverageMap,
  parseCoverageMap,
} from "./coverageMapCodec";
export {
  serializeVerificationResult,
  parseVerificationResult,
  serializeProvenanceBullet,
  parseProvenanceBullet,
} from "./verificationCodec";
