import { EventEmitter } from "events";
import type dgram from "dgram";
import type { DeviceReader, DeviceWriter } from "../device/files";
import { MIDI_COMMAND_PREFIX } from "../midi/constants";

/**
 * Payload `/midi` de 11 octets: [0..7]=remplissage, [8]=vélocité, [9]=note, [10]=status|canal.
 */
export function midiPayload(command: number, note: number, velocity: number, fill = 0): Uint8Array {
  const p = new Uint8Array(11).fill(fill);
  p[8] = velocity;
  p[9] = note;
  p[10] = command;
  return p;
}

/** Paquet UDP complet: préfixe ASCII + payload. */
export function midiPacket(command: number, note: number, velocity: number): Buffer {
  return Buffer.concat([Buffer.from(MIDI_COMMAND_PREFIX, "ascii"), midiPayload(command, note, velocity)]);
}

/** Laisse s'exécuter toutes les microtâches en attente. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * MIDI OUT en mémoire. Rend la main entre chaque octet, pour qu'une écriture
 * concurrente non verrouillée s'entrelace dans `stream`.
 */
export class MemoryDeviceWriter implements DeviceWriter {
  readonly stream: number[] = [];
  readonly calls: number[][] = [];
  closed = false;
  failNext: Error | null = null;

  constructor(readonly path = "mem-out") {}

  async write(bytes: Uint8Array): Promise<void> {
    const failure = this.failNext;
    if (failure) {
      this.failNext = null;
      throw failure;
    }
    const call: number[] = [];
    for (const b of bytes) {
      await Promise.resolve();
      this.stream.push(b);
      call.push(b);
    }
    this.calls.push(call);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

type ReadStep = Uint8Array | Error | "eof";

/** MIDI IN en mémoire: `push` un bloc, une erreur ou la fin de flux; `read` attend sinon. */
export class MemoryDeviceReader implements DeviceReader {
  closed = false;
  private readonly queue: ReadStep[] = [];
  private wake: (() => void) | null = null;

  constructor(readonly path = "mem-in") {}

  push(step: ReadStep): void {
    this.queue.push(step);
    this.notify();
  }

  async read(buffer: Uint8Array): Promise<number> {
    while (this.queue.length === 0 && !this.closed) {
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
    const step = this.queue.shift();
    if (step === undefined) throw new Error("mem-in fermé");
    if (step === "eof") return 0;
    if (step instanceof Error) throw step;
    const n = Math.min(step.length, buffer.length);
    buffer.set(step.subarray(0, n));
    return n;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

/** Socket UDP factice (aucun accès réseau). */
export class FakeUdpSocket extends EventEmitter {
  bindError: Error | null = null;
  closed = false;
  private bound: { address: string; port: number } | null = null;

  bind(port: number, address: string): this {
    setImmediate(() => {
      if (this.bindError) {
        this.emit("error", this.bindError);
        return;
      }
      this.bound = { address, port: port === 0 ? 40000 : port };
      this.emit("listening");
    });
    return this;
  }

  address(): { address: string; family: string; port: number } {
    if (!this.bound) throw new Error("not bound");
    return { ...this.bound, family: "IPv4" };
  }

  close(callback?: () => void): this {
    this.closed = true;
    if (callback) setImmediate(callback);
    return this;
  }

  receive(data: Uint8Array | string, from = { address: "127.0.0.1", port: 50000 }): void {
    const msg = typeof data === "string" ? Buffer.from(data) : Buffer.from(data);
    this.emit("message", msg, { ...from, family: "IPv4", size: msg.length });
  }

  /** Vue typée pour l'injection dans UdpListener. */
  asSocket(): dgram.Socket {
    return this as unknown as dgram.Socket;
  }
}
