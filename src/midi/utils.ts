import { MidiStatus, type MidiStatusName } from "./constants";

/**
 * Retourne une représentation hexadécimale lisible (ex: "92 3c 64").
 */
export function hex(bytes: ArrayLike<number>): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

/**
 * Chaque octet en 8 chiffres binaires, concaténés sans séparateur
 * (ex: [0x92, 0x3c] → "1001001000111100").
 */
export function binary(bytes: ArrayLike<number>): string {
  return Array.from(bytes, (b) => (b & 0xff).toString(2).padStart(8, "0")).join("");
}

const namesByStatus: Record<number, MidiStatusName | undefined> = {
  [MidiStatus.NoteOff]: "NoteOff",
  [MidiStatus.NoteOn]: "NoteOn",
  [MidiStatus.Aftertouch]: "Aftertouch",
  [MidiStatus.ContinuousController]: "ContinuousController",
  [MidiStatus.PatchChange]: "PatchChange",
  [MidiStatus.ChannelPressure]: "ChannelPressure",
  [MidiStatus.PitchBend]: "PitchBend",
  [MidiStatus.System]: "System",
};

/** Nom du type de message pour un nibble de status (0x8..0xF), sinon "Unknown". */
export function statusName(status: number): MidiStatusName | "Unknown" {
  return namesByStatus[status & 0x0f] ?? "Unknown";
}
