import { logger } from "../logger";
import { DeviceReadError } from "../errors";
import type { DeviceReader, DeviceWriter } from "../device/files";
import { decodePayload, encodeNote, formatNote } from "../midi/codec";
import { INPUT_BUFFER_SIZE, MIDI_PAYLOAD_LENGTH } from "../midi/constants";
import { binary, hex } from "../midi/utils";
import { Lock } from "../shared/lock";

/** Reçoit chaque bloc lu sur le MIDI IN (copie indépendante du buffer de lecture). */
export type DeviceInputSink = (bytes: Uint8Array) => void;

export function formatDeviceIn(bytes: Uint8Array): string {
  return `Midi Device In: ${binary(bytes)}`;
}

export const logDeviceIn: DeviceInputSink = (bytes) => {
  logger.info(formatDeviceIn(bytes));
};

export interface DeviceBridgeStats {
  writes: number;
  writeErrors: number;
  inputChunks: number;
}

/**
 * Pont vers l'instrument MIDI série.
 * - OUT: partagé par toutes les tâches de dispatch, une écriture à la fois (verrou limité à l'écriture)
 * - IN: lu par une seule boucle, chaque bloc est transmis au sink
 */
export class DeviceBridge {
  private readonly writeLock = new Lock();
  private readonly counters: DeviceBridgeStats = { writes: 0, writeErrors: 0, inputChunks: 0 };
  private listening = false;
  private closed = false;
  private closing: Promise<void> | null = null;

  constructor(
    private readonly output: DeviceWriter,
    private readonly input: DeviceReader,
    private readonly sink: DeviceInputSink = logDeviceIn
  ) {}

  /**
   * Payload `/midi` (préfixe retiré). Une longueur autre que 11 est ignorée sans log.
   */
  async handleMidiPayload(payload: Uint8Array): Promise<void> {
    if (payload.length !== MIDI_PAYLOAD_LENGTH) return;
    const note = decodePayload(payload);
    logger.info(formatNote(note));
    await this.write(Uint8Array.from(encodeNote(note)));
  }

  /**
   * Écrit une trame sur le MIDI OUT sous verrou exclusif.
   * @returns false si l'écriture a échoué (l'erreur est loguée, pas propagée)
   */
  async write(bytes: Uint8Array): Promise<boolean> {
    const release = await this.writeLock.acquire();
    try {
      await this.output.write(bytes);
      this.counters.writes += 1;
      logger.trace(`MIDI OUT -> ${this.output.path}: [${hex(bytes)}]`);
      return true;
    } catch (err) {
      this.counters.writeErrors += 1;
      logger.error(`Écriture MIDI OUT échouée '${this.output.path}' [${hex(bytes)}]:`, err);
      return false;
    } finally {
      release();
    }
  }

  /**
   * Boucle de lecture du MIDI IN, jusqu'à {@link close}.
   * Rejette avec DeviceReadError sur erreur de lecture ou fin de flux: c'est à
   * l'appelant d'arrêter le processus.
   */
  async listenInput(): Promise<void> {
    if (this.listening) throw new Error("MIDI IN déjà en écoute");
    this.listening = true;
    const buf = new Uint8Array(INPUT_BUFFER_SIZE);
    logger.debug(`MIDI IN: écoute de ${this.input.path}`);
    try {
      while (!this.closed) {
        let n: number;
        try {
          n = await this.input.read(buf);
        } catch (err) {
          if (this.closed) return;
          throw new DeviceReadError(`Lecture MIDI IN échouée: ${this.input.path}`, err);
        }
        if (this.closed) return;
        if (n === 0) {
          throw new DeviceReadError(`MIDI IN fermé (fin de flux): ${this.input.path}`);
        }
        this.counters.inputChunks += 1;
        this.sink(buf.slice(0, n));
      }
    } finally {
      this.listening = false;
    }
  }

  stats(): DeviceBridgeStats {
    return { ...this.counters };
  }

  /**
   * Arrête la boucle IN et ferme les périphériques (idempotent).
   * La fermeture du IN n'est pas attendue: une lecture bloquée sur le périphérique la retarde.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closed = true;
      this.input.close().catch((err) => logger.debug(`Fermeture MIDI IN '${this.input.path}':`, err));
      this.closing = this.writeLock.runExclusive(() => this.output.close()).catch((err) => {
        logger.warn(`Fermeture MIDI OUT '${this.output.path}' échouée:`, err);
      });
    }
    return this.closing;
  }
}
