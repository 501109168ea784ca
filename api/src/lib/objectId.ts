import { randomBytes } from "node:crypto";

const MAX_COUNTER = 0xffffff;

// Fixed for the life of the process.
const processBytes = randomBytes(5);
let counter = randomBytes(3).readUIntBE(0, 3);

/**
 * 24-hex-character id: 4-byte seconds timestamp, 5 process-random bytes and
 * a 3-byte incrementing counter. Ids from one process never repeat.
 */
export function generateObjectId(now: Date = new Date()): string {
  counter = (counter + 1) % MAX_COUNTER;

  const buf = Buffer.alloc(12);
  buf.writeUInt32BE(Math.floor(now.getTime() / 1000) >>> 0, 0);
  processBytes.copy(buf, 4);
  buf.writeUIntBE(counter, 9, 3);
  return buf.toString("hex");
}
