/**
 * Typed document for one decoded Push Port message
 *
 * Message -> UniqueResponse -> Timestamp -> Location -> LocationEvent.
 * Every node is read-only once decoded and renders itself as text.
 */
import {
  renderEvent,
  renderLocation,
  renderMessage,
  renderTimestamp,
  renderUniqueResponse,
} from "./render";

export interface Renderable {
  render(): string;
}

/** One observed or forecast arrival, departure or pass. */
export class LocationEvent implements Renderable {
  constructor(
    readonly actual: string,
    readonly estimated: string,
    readonly source: string,
  ) {}

  render(): string {
    return renderEvent(this);
  }
}

export interface LocationFields {
  tpl: string;
  pta: string;
  ptd: string;
  wta: string;
  wtd: string;
  wtp: string;
  arrival?: LocationEvent;
  departure?: LocationEvent;
  pass?: LocationEvent;
}

/** A timing point location on the service's route. */
export class Location implements Renderable {
  readonly tpl: string;
  /** Public time of arrival */
  readonly pta: string;
  /** Public time of departure */
  readonly ptd: string;
  /** Working time of arrival */
  readonly wta: string;
  /** Working time of departure */
  readonly wtd: string;
  /** Working time of passing */
  readonly wtp: string;
  readonly arrival: LocationEvent | undefined;
  readonly departure: LocationEvent | undefined;
  readonly pass: LocationEvent | undefined;

  constructor(fields: LocationFields) {
    this.tpl = fields.tpl;
    this.pta = fields.pta;
    this.ptd = fields.ptd;
    this.wta = fields.wta;
    this.wtd = fields.wtd;
    this.wtp = fields.wtp;
    this.arrival = fields.arrival;
    this.departure = fields.departure;
    this.pass = fields.pass;
  }

  render(): string {
    return renderLocation(this);
  }
}

/** A batch of forecast changes for one train service. */
export class Timestamp implements Renderable {
  constructor(
    readonly rid: string,
    readonly ssd: string,
    readonly uid: string,
    readonly locations: readonly Location[],
  ) {}

  static empty(): Timestamp {
    return new Timestamp("", "", "", []);
  }

  render(): string {
    return renderTimestamp(this);
  }
}

export class UniqueResponse implements Renderable {
  constructor(
    readonly updateOrigin: string,
    readonly timestamp: Timestamp,
  ) {}

  static empty(): UniqueResponse {
    return new UniqueResponse("", Timestamp.empty());
  }

  render(): string {
    return renderUniqueResponse(this);
  }
}

export interface Namespaces {
  default: string;
  ns2: string;
  ns3: string;
}

/** Root of one feed update. */
export class Message implements Renderable {
  constructor(
    readonly namespaces: Namespaces,
    readonly timestamp: string,
    readonly version: string,
    readonly uniqueResponse: UniqueResponse,
  ) {}

  render(): string {
    return renderMessage(this);
  }
}
