import type { Perspective } from "../domain/types.js";

export const SIMPLE_HEADER = 0xffffffff;
const INFO_REQUEST = 0x54;
export const INFO_REPLY = 0x49;
export const CHALLENGE_REPLY = 0x41;
const QUERY_PAYLOAD = "Source Engine Query\0";

export type ServerInfo = {
  protocol: number;
  name: string;
  map: string;
  folder: string;
  game: string;
  appId: number;
  players: number;
  maxPlayers: number;
  bots: number;
  version: string;
  keywords: string | null;
};

export type InfoReply =
  | { type: "info"; info: ServerInfo }
  | { type: "challenge"; challenge: Buffer }
  | { type: "invalid"; reason: string };

class PacketReader {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  byte(): number {
    this.need(1);
    const value = this.buffer.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  short(): number {
    this.need(2);
    const value = this.buffer.readUInt16LE(this.offset);
    this.offset += 2;
    return value;
  }

  uint64(): bigint {
    this.need(8);
    const value = this.buffer.readBigUInt64LE(this.offset);
    this.offset += 8;
    return value;
  }

  int32(): number {
    this.need(4);
    const value = this.buffer.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  bytes(length: number): Buffer {
    this.need(length);
    const value = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  string(): string {
    const end = this.buffer.indexOf(0, this.offset);
    if (end === -1) {
      throw new RangeError("unterminated string");
    }
    const value = this.buffer.toString("utf8", this.offset, end);
    this.offset = end + 1;
    return value;
  }

  skip(length: number): void {
    this.bytes(length);
  }

  private need(length: number): void {
    if (this.remaining < length) {
      throw new RangeError("packet truncated");
    }
  }
}

export function buildInfoRequest(challenge?: Buffer): Buffer {
  const header = Buffer.alloc(5);
  header.writeUInt32LE(SIMPLE_HEADER, 0);
  header.writeUInt8(INFO_REQUEST, 4);
  const parts: Buffer[] = [header, Buffer.from(QUERY_PAYLOAD, "latin1")];
  if (challenge) {
    parts.push(challenge);
  }
  return Buffer.concat(parts);
}

export function parseInfoReply(packet: Buffer): InfoReply {
  try {
    const reader = new PacketReader(packet);
    if (reader.int32() !== SIMPLE_HEADER) {
      return { type: "invalid", reason: "unsupported packet header" };
    }

    const kind = reader.byte();
    if (kind === CHALLENGE_REPLY) {
      return { type: "challenge", challenge: Buffer.from(reader.bytes(4)) };
    }

    if (kind !== INFO_REPLY) {
      return { type: "invalid", reason: `unexpected reply type 0x${kind.toString(16)}` };
    }

    const protocol = reader.byte();
    const name = reader.string();
    const map = reader.string();
    const folder = reader.string();
    const game = reader.string();
    let appId = reader.short();
    const players = reader.byte();
    const maxPlayers = reader.byte();
    const bots = reader.byte();
    reader.skip(4); // server type, environment, visibility, VAC
    const version = reader.remaining > 0 ? reader.string() : "";

    let keywords: string | null = null;
    if (reader.remaining > 0) {
      const flags = reader.byte();
      if (flags & 0x80) reader.skip(2);
      if (flags & 0x10) reader.skip(8);
      if (flags & 0x40) {
        reader.skip(2);
        reader.string();
      }
      if (flags & 0x20) keywords = reader.string();
      // The 64-bit game id carries the full app id in its low 24 bits.
      if (flags & 0x01) appId = Number(reader.uint64() & 0xffffffn);
    }

    return {
      type: "info",
      info: { protocol, name, map, folder, game, appId, players, maxPlayers, bots, version, keywords }
    };
  } catch (error) {
    return { type: "invalid", reason: error instanceof Error ? error.message : String(error) };
  }
}

/** DayZ servers advertise their camera mode as `1pp` / `3pp` tokens in the keywords. */
export function perspectiveFromKeywords(keywords: string | null): Perspective {
  const lowered = keywords?.toLowerCase() ?? "";
  const first = lowered.includes("1pp");
  const third = lowered.includes("3pp");
  if (first && third) {
    return "1PP/3PP";
  }
  if (first) {
    return "1PP";
  }
  return third ? "3PP" : "unknown";
}
