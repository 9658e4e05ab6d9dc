/**
 * Décodage du payload `/midi` (11 octets) en note MIDI, et réencodage en trame
 * MIDI 3 octets [status|canal, note, vélocité].
 */
import { MalformedPayloadError } from "../errors";
import { COMMAND_OFFSET, MIDI_PAYLOAD_LENGTH, NOTE_OFFSET, VELOCITY_OFFSET } from "./constants";
import { hex, statusName } from "./utils";

export interface MidiNote {
  status: number; // nibble haut (0x8..0xF)
  channel: number; // 0..15
  note: number; // 0..127 (non borné)
  velocity: number; // 0..127 (non borné)
  /** Octet status/canal tel que reçu, réémis tel quel par {@link encodeNote}. */
  command: number;
}

export type MidiWireMessage = [number, number, number];

export function decodePayload(payload: Uint8Array): MidiNote {
  if (payload.length !== MIDI_PAYLOAD_LENGTH) {
    throw new MalformedPayloadError(payload.length);
  }
  const command = payload[COMMAND_OFFSET];
  return {
    status: command >> 4,
    channel: command & 0x0f,
    note: payload[NOTE_OFFSET],
    velocity: payload[VELOCITY_OFFSET],
    command,
  };
}

export function encodeNote(note: MidiNote): MidiWireMessage {
  return [note.command, note.note, note.velocity];
}

export function formatNote(note: MidiNote): string {
  const name = statusName(note.status);
  return `MidiNote: ${name} ch=${note.channel} note=${note.note} vel=${note.velocity} [${hex(encodeNote(note))}]`;
}
