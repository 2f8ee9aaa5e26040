import {
  ECDH,
  createCipheriv,
  createDecipheriv,
  createECDH,
  createHmac,
  randomBytes,
} from 'node:crypto';

export const CURVE_NAME = 'prime256v1';

export {
  ECDH,
  createCipheriv,
  createDecipheriv,
  createECDH,
  createHmac,
  randomBytes,
};
