/**
 * Erreurs de la passerelle. Les erreurs fatales (config, ouverture des
 * périphériques, bind UDP, lecture MIDI IN) remontent jusqu'à `main()`.
 */
export class GatewayError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Configuration invalide ou incomplète. */
export class ConfigError extends GatewayError {}

/** Ouverture d'un périphérique MIDI impossible. */
export class DeviceOpenError extends GatewayError {
  constructor(readonly path: string, cause?: unknown) {
    super(`Ouverture du périphérique impossible: ${path}`, cause);
  }
}

/** Lecture du périphérique MIDI IN en échec (ou fin de flux). */
export class DeviceReadError extends GatewayError {}

/** Bind du socket UDP en échec. */
export class SocketBindError extends GatewayError {}

/** Payload /midi de longueur différente de 11 octets. */
export class MalformedPayloadError extends GatewayError {
  constructor(readonly length: number) {
    super(`Payload MIDI invalide: ${length} octets (11 attendus)`);
  }
}
