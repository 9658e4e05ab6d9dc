import type dgram from "dgram";
import type { AddressInfo } from "net";
import { logger, setLogLevel, getLogLevel } from "./logger";
import { resolveConfig, watchConfig, type ConfigOverrides, type FileConfig, type GatewayConfig } from "./config";
import { openDevices, type DevicePaths, type DeviceReader, type DeviceWriter } from "./device/files";
import { DeviceBridge, type DeviceInputSink } from "./bridge/deviceBridge";
import { CommandDispatcher } from "./commands/dispatcher";
import { UdpListener } from "./network/udpListener";

/** Points d'injection (tests: périphériques en mémoire, socket factice). */
export interface GatewayDeps {
  openDevices?: (paths: DevicePaths) => Promise<{ input: DeviceReader; output: DeviceWriter }>;
  createSocket?: () => dgram.Socket;
  sink?: DeviceInputSink;
}

export interface Gateway {
  readonly bridge: DeviceBridge;
  readonly listener: UdpListener;
  readonly address: AddressInfo;
  /** Rejette (DeviceReadError) si la boucle MIDI IN échoue; ne se résout jamais. */
  readonly fatal: Promise<never>;
  stop(): Promise<void>;
}

/**
 * Démarre la passerelle:
 * - ouvre les périphériques MIDI IN/OUT
 * - lance la boucle MIDI IN
 * - bind le socket UDP et dispatch chaque datagramme
 *
 * @throws DeviceOpenError / SocketBindError (fatals)
 */
export async function startGateway(config: GatewayConfig, deps: GatewayDeps = {}): Promise<Gateway> {
  setLogLevel(config.logLevel);
  const { input, output } = await (deps.openDevices ?? openDevices)(config.midi);

  const bridge = new DeviceBridge(output, input, deps.sink);
  const dispatcher = new CommandDispatcher(bridge);
  const listener = new UdpListener(dispatcher, { ...config.udp, createSocket: deps.createSocket });

  const inputLoop = bridge.listenInput();
  const fatal = inputLoop.then(() => {
    logger.debug("MIDI IN: boucle arrêtée.");
    return new Promise<never>(() => {});
  });
  fatal.catch((err) => logger.debug("MIDI IN: boucle en erreur:", err));

  let address: AddressInfo;
  try {
    address = await listener.listen();
  } catch (err) {
    await bridge.close();
    throw err;
  }

  let stopped = false;
  const stop = async (): Promise<void> => {
    if (stopped) return;
    stopped = true;
    await listener.close();
    await bridge.close();
    const s = bridge.stats();
    logger.info(
      `Passerelle arrêtée (UDP reçus=${listener.receivedCount()}, écritures=${s.writes}, échecs=${s.writeErrors}, blocs IN=${s.inputChunks}).`
    );
  };

  logger.info(`Passerelle prête: UDP ${address.address}:${address.port} → ${config.midi.output}`);
  return { bridge, listener, address, fatal, stop };
}

/**
 * Applique à chaud les changements du fichier de configuration.
 * Seul `log_level` est pris en compte; les autres changements demandent un redémarrage.
 */
export function applyConfigChange(
  running: GatewayConfig,
  next: FileConfig,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): void {
  const wanted = resolveConfig(next, overrides, env, running.configPath);
  if (wanted.logLevel !== getLogLevel()) {
    setLogLevel(wanted.logLevel);
    logger.info(`Niveau de log: ${wanted.logLevel}`);
  }
  const restartNeeded =
    wanted.midi.input !== running.midi.input ||
    wanted.midi.output !== running.midi.output ||
    wanted.udp.host !== running.udp.host ||
    wanted.udp.port !== running.udp.port;
  if (restartNeeded) {
    logger.warn("Configuration modifiée (périphériques/UDP): redémarrage nécessaire pour l'appliquer.");
  }
}

/**
 * Observe le fichier de configuration utilisé (s'il y en a un).
 * @returns Fonction pour arrêter l'observation
 */
export function watchRunningConfig(running: GatewayConfig, overrides: ConfigOverrides = {}): () => void {
  if (!running.configPath) return () => {};
  return watchConfig(
    running.configPath,
    (next) => {
      try {
        applyConfigChange(running, next, overrides);
      } catch (err) {
        logger.warn("Configuration rechargée ignorée:", err);
      }
    },
    (err) => logger.warn("Erreur hot reload config:", err)
  );
}
