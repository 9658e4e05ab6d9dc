/**
 * Nibbles de status des messages MIDI (4 bits de poids fort de l'octet de commande).
 * Le nibble bas porte le canal (0..15).
 */
export const MidiStatus = {
  NoteOff: 0x8,
  NoteOn: 0x9,
  Aftertouch: 0xa,
  ContinuousController: 0xb,
  PatchChange: 0xc,
  ChannelPressure: 0xd,
  PitchBend: 0xe,
  System: 0xf,
} as const;

export type MidiStatusName = keyof typeof MidiStatus;

/** Préfixe ASCII des paquets UDP portant une note MIDI. */
export const MIDI_COMMAND_PREFIX = "/midi";

/** Longueur exacte du payload qui suit le préfixe. */
export const MIDI_PAYLOAD_LENGTH = 11;

/** Offsets dans le payload (après retrait du préfixe). Les octets 0..7 ne sont pas utilisés. */
export const VELOCITY_OFFSET = 8;
export const NOTE_OFFSET = 9;
export const COMMAND_OFFSET = 10;

/** Taille max d'une lecture (MIDI IN) ou d'un datagramme UDP. */
export const INPUT_BUFFER_SIZE = 1024;

export const DEFAULT_UDP_HOST = "0.0.0.0";
export const DEFAULT_UDP_PORT = 12101;
