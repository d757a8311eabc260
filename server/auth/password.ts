import { randomBytes, scrypt, timingSafeEqual, type ScryptOptions } from "crypto";

const KEY_LENGTH = 64;
const SALT_BYTES = 16;
const SCRYPT_OPTIONS: ScryptOptions = { N: 16384, r: 8, p: 1 };

function deriveKey(password: string, salt: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, SCRYPT_OPTIONS, (err, key) => {
      if (err) reject(err);
      else resolve(key);
    });
  });
}

/** Returns `<hex key>.<hex salt>`. */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_BYTES).toString("hex");
  const buf = await deriveKey(password, salt);
  return `${buf.toString("hex")}.${salt}`;
}

export async function comparePasswords(supplied: string, stored: string): Promise<boolean> {
  const [hashedPassword, salt] = stored.split(".");
  if (!hashedPassword || !salt) return false;

  const expected = Buffer.from(hashedPassword, "hex");
  if (expected.length !== KEY_LENGTH) return false;

  const buf = await deriveKey(supplied, salt);
  return timingSafeEqual(expected, buf);
}
