import os from 'node:os';

export const FRAME_HEADER_BYTES = 8; // uint32 jsonLen + uint32 binaryLen
export const RESPONSE_HEADER_BYTES = 4; // uint32 jsonLen
export const MAX_RESPONSE_JSON_BYTES = 8 * 1024 * 1024;

export type DecodedFrame =
  | { kind: 'message'; json: string }
  | { kind: 'invalid_length'; jsonLength: number };

/** Header, JSON body and binary payload, in write order. */
export const encodeRequestFrame = (payload: Record<string, unknown>, binaryData?: Buffer): Buffer[] => {
  const jsonBytes = Buffer.from(JSON.stringify(payload), 'utf8');
  const binaryBytes = binaryData && binaryData.length > 0 ? binaryData : Buffer.alloc(0);
  const header = Buffer.allocUnsafe(FRAME_HEADER_BYTES);
  header.writeUInt32LE(jsonBytes.length, 0);
  header.writeUInt32LE(binaryBytes.length, 4);

  return binaryBytes.length > 0 ? [header, jsonBytes, binaryBytes] : [header, jsonBytes];
};

export const float32ToLeBuffer = (samples: Float32Array): Buffer => {
  if (os.endianness() === 'LE') {
    return Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength);
  }

  const output = Buffer.allocUnsafe(samples.length * 4);
  for (let index = 0; index < samples.length; index += 1) {
    output.writeFloatLE(samples[index], index * 4);
  }

  return output;
};

export const leBufferToFloat32 = (bytes: Buffer): Float32Array => {
  const sampleCount = Math.floor(bytes.length / 4);
  const output = new Float32Array(sampleCount);
  for (let index = 0; index < sampleCount; index += 1) {
    output[index] = bytes.readFloatLE(index * 4);
  }

  return output;
};

/**
 * Reassembles length-prefixed JSON responses from arbitrary stdout chunks.
 */
export class ResponseFrameDecoder {
  private buffer = Buffer.alloc(0);

  public push(chunk: Buffer): DecodedFrame[] {
    this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
    const frames: DecodedFrame[] = [];

    while (this.buffer.length >= RESPONSE_HEADER_BYTES) {
      const jsonLength = this.buffer.readUInt32LE(0);
      if (jsonLength <= 0 || jsonLength > MAX_RESPONSE_JSON_BYTES) {
        // Framing is lost; nothing after this point can be trusted.
        this.buffer = Buffer.alloc(0);
        frames.push({ kind: 'invalid_length', jsonLength });
        return frames;
      }

      const frameBytes = RESPONSE_HEADER_BYTES + jsonLength;
      if (this.buffer.length < frameBytes) {
        break;
      }

      frames.push({
        kind: 'message',
        json: this.buffer.subarray(RESPONSE_HEADER_BYTES, frameBytes).toString('utf8')
      });
      this.buffer = Buffer.from(this.buffer.subarray(frameBytes));
    }

    return frames;
  }

  public reset(): void {
    this.buffer = Buffer.alloc(0);
  }
}
