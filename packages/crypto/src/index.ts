export {
  encrypt,
  decrypt,
  serializeEncrypted,
  parseEncrypted,
  SecretBox,
} from "./encryption.js";
export type { EncryptedData, SecretCipher } from "./encryption.js";

export { generateHmac, verifyHmac, fingerprint } from "./hmac.js";
