import { logger } from "../logger";
import { MIDI_COMMAND_PREFIX } from "../midi/constants";

/** Cible des commandes `/midi` (implémentée par DeviceBridge). */
export interface MidiPayloadHandler {
  handleMidiPayload(payload: Uint8Array): Promise<void>;
}

const MIDI_PREFIX_BYTES = Buffer.from(MIDI_COMMAND_PREFIX, "ascii");

/** Comparaison octet par octet, sensible à la casse, sur la longueur du préfixe uniquement. */
export function hasPrefix(packet: Uint8Array, prefix: Uint8Array): boolean {
  if (packet.length < prefix.length) return false;
  for (let i = 0; i < prefix.length; i += 1) {
    if (packet[i] !== prefix[i]) return false;
  }
  return true;
}

/**
 * Aiguille un paquet de contrôle: `/midi` → payload vers le pont MIDI, sinon "not implemented".
 * Sans état partagé: plusieurs dispatchs peuvent s'exécuter en parallèle.
 */
export class CommandDispatcher {
  constructor(private readonly midi: MidiPayloadHandler) {}

  async dispatch(packet: Uint8Array): Promise<void> {
    if (hasPrefix(packet, MIDI_PREFIX_BYTES)) {
      await this.midi.handleMidiPayload(packet.subarray(MIDI_PREFIX_BYTES.length));
      return;
    }
    logger.warn(`${Buffer.from(packet).toString()} not implemented`);
  }
}
