import dgram from "dgram";
import type { AddressInfo } from "net";
import { logger } from "../logger";
import { SocketBindError } from "../errors";
import { INPUT_BUFFER_SIZE } from "../midi/constants";

/** Reçoit chaque datagramme (copie indépendante). Implémenté par CommandDispatcher. */
export interface PacketDispatcher {
  dispatch(packet: Uint8Array): Promise<void>;
}

export interface UdpListenerOptions {
  host: string;
  port: number;
  /** Fabrique de socket (tests: socket factice en mémoire). */
  createSocket?: () => dgram.Socket;
}

const createUdp4Socket = (): dgram.Socket => dgram.createSocket("udp4");

/**
 * Écoute UDP: un dispatch indépendant par datagramme, sans attente ni limite de concurrence.
 * Une erreur socket après le bind est loguée et l'écoute continue.
 */
export class UdpListener {
  private socket: dgram.Socket | null = null;
  private received = 0;

  constructor(
    private readonly dispatcher: PacketDispatcher,
    private readonly opts: UdpListenerOptions
  ) {}

  /**
   * Bind du socket.
   * @throws SocketBindError si le port/adresse ne peut être lié
   */
  listen(): Promise<AddressInfo> {
    if (this.socket) return Promise.reject(new Error("UDP déjà en écoute"));
    const socket = (this.opts.createSocket ?? createUdp4Socket)();
    this.socket = socket;
    const { host, port } = this.opts;

    return new Promise<AddressInfo>((resolve, reject) => {
      const onBindError = (err: Error) => {
        this.socket = null;
        try {
          socket.close();
        } catch (closeErr) {
          logger.debug("Fermeture socket UDP après échec du bind:", closeErr);
        }
        reject(new SocketBindError(`Bind UDP impossible sur ${host}:${port}`, err));
      };
      socket.once("error", onBindError);
      socket.once("listening", () => {
        socket.removeListener("error", onBindError);
        socket.on("error", (err) => logger.warn("Erreur socket UDP (écoute maintenue):", err));
        socket.on("message", (msg, rinfo) => this.onMessage(msg, rinfo));
        const addr = socket.address();
        logger.info(`UDP en écoute sur ${addr.address}:${addr.port}`);
        resolve(addr);
      });
      socket.bind(port, host);
    });
  }

  receivedCount(): number {
    return this.received;
  }

  close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket) return Promise.resolve();
    return new Promise<void>((resolve) => socket.close(() => resolve()));
  }

  private onMessage(msg: Buffer, rinfo: dgram.RemoteInfo): void {
    this.received += 1;
    // Une réception = au plus INPUT_BUFFER_SIZE octets, le reste est ignoré
    const data = msg.subarray(0, INPUT_BUFFER_SIZE);
    logger.debug(`Received ${data.toString()} from ${rinfo.address}:${rinfo.port}`);
    const packet = Uint8Array.from(data);
    this.dispatcher.dispatch(packet).catch((err) => {
      logger.error(`Dispatch échoué (${rinfo.address}:${rinfo.port}):`, err);
    });
  }
}
