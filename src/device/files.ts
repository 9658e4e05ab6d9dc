import { open, type FileHandle } from "fs/promises";
import { logger } from "../logger";
import { DeviceOpenError } from "../errors";

/** Flux d'octets en lecture (MIDI IN). `read` renvoie 0 en fin de flux. */
export interface DeviceReader {
  readonly path: string;
  read(buffer: Uint8Array): Promise<number>;
  close(): Promise<void>;
}

/** Flux d'octets en écriture (MIDI OUT). */
export interface DeviceWriter {
  readonly path: string;
  write(bytes: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export interface DevicePaths {
  input: string;
  output: string;
}

async function openHandle(path: string, flags: "r" | "w"): Promise<FileHandle> {
  try {
    return await open(path, flags);
  } catch (err) {
    throw new DeviceOpenError(path, err);
  }
}

/** Périphérique caractère (ex: /dev/ttyAMA0, /dev/snd/midiC1D0) ouvert en lecture. */
export class FileDeviceReader implements DeviceReader {
  private constructor(readonly path: string, private readonly handle: FileHandle) {}

  static async open(path: string): Promise<FileDeviceReader> {
    return new FileDeviceReader(path, await openHandle(path, "r"));
  }

  async read(buffer: Uint8Array): Promise<number> {
    const { bytesRead } = await this.handle.read(buffer, 0, buffer.length, null);
    return bytesRead;
  }

  close(): Promise<void> {
    return this.handle.close();
  }
}

/** Périphérique caractère ouvert en écriture. Une trame est écrite en entier avant de rendre la main. */
export class FileDeviceWriter implements DeviceWriter {
  private constructor(readonly path: string, private readonly handle: FileHandle) {}

  static async open(path: string): Promise<FileDeviceWriter> {
    return new FileDeviceWriter(path, await openHandle(path, "w"));
  }

  async write(bytes: Uint8Array): Promise<void> {
    let offset = 0;
    while (offset < bytes.length) {
      const { bytesWritten } = await this.handle.write(bytes, offset, bytes.length - offset, null);
      offset += bytesWritten;
    }
  }

  close(): Promise<void> {
    return this.handle.close();
  }
}

/**
 * Ouvre les périphériques MIDI IN/OUT (éventuellement le même chemin, ouvert deux fois).
 * @throws DeviceOpenError si l'un des deux ne peut être ouvert
 */
export async function openDevices(paths: DevicePaths): Promise<{ input: DeviceReader; output: DeviceWriter }> {
  const input = await FileDeviceReader.open(paths.input);
  logger.info(`MIDI IN ouvert: ${paths.input}`);
  try {
    const output = await FileDeviceWriter.open(paths.output);
    logger.info(`MIDI OUT ouvert: ${paths.output}`);
    return { input, output };
  } catch (err) {
    try {
      await input.close();
    } catch (closeErr) {
      logger.debug("Fermeture MIDI IN après échec OUT:", closeErr);
    }
    throw err;
  }
}
