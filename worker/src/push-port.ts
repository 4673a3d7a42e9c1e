/**
 * Push Port XML decoder for Darwin schedule updates
 */
import xml2js, { type ParserOptions } from "xml2js";
import { z } from "zod";
import { MalformedPayloadError } from "./errors";
import { Location, LocationEvent, Message, Timestamp, UniqueResponse } from "./model";

// xml2js puts attributes under "$", child elements in arrays, and collapses an
// element with neither to a string.
const attributes = z.record(z.string()).default({});

function element<T extends z.ZodRawShape>(children: T) {
  return z.preprocess(
    (node) => (typeof node === "string" ? {} : node),
    z.object({ $: attributes, ...children }),
  );
}

const eventNode = element({});

const locationNode = element({
  arr: z.array(eventNode).optional(),
  dep: z.array(eventNode).optional(),
  pass: z.array(eventNode).optional(),
});

const timestampNode = element({
  Location: z.array(locationNode).optional(),
});

const uniqueResponseNode = element({
  TS: z.array(timestampNode).optional(),
});

const messageNode = z.object({
  $: z
    .object({
      ts: z.string(),
      version: z.string(),
      xmlns: z.string().default(""),
      "xmlns:ns2": z.string().default(""),
      "xmlns:ns3": z.string().default(""),
    })
    .passthrough(),
  uR: z.array(uniqueResponseNode).optional(),
});

type EventNode = z.infer<typeof eventNode>;
type LocationNode = z.infer<typeof locationNode>;
type TimestampNode = z.infer<typeof timestampNode>;
type UniqueResponseNode = z.infer<typeof uniqueResponseNode>;

const parserOptions: ParserOptions = {
  explicitArray: true,
  strict: true,
  tagNameProcessors: [xml2js.processors.stripPrefix],
};

// Invalid byte sequences throw instead of becoming U+FFFD
const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode one decompressed message body.
 *
 * Missing optional elements and attributes become empty strings. Throws
 * MalformedPayloadError when the body is not valid UTF-8, is not well-formed
 * XML, or the root
 * element has no `ts`/`version`.
 */
export async function decodePushPort(payload: Buffer | string): Promise<Message> {
  let document: unknown;
  try {
    const text = typeof payload === "string" ? payload : utf8.decode(payload);
    document = await xml2js.parseStringPromise(text, parserOptions);
  } catch (error) {
    throw new MalformedPayloadError(`Payload is not well-formed XML: ${error}`, { cause: error });
  }

  // xml2js yields null for a blank document
  if (document === null || typeof document !== "object") {
    throw new MalformedPayloadError("Payload is empty");
  }

  const [root] = Object.values(document);
  const parsed = messageNode.safeParse(root);
  if (!parsed.success) {
    throw new MalformedPayloadError(
      `Root element is missing required attributes: ${parsed.error.issues
        .map((issue) => issue.path.join("."))
        .join(", ")}`,
      { cause: parsed.error },
    );
  }

  const { $, uR } = parsed.data;
  const uniqueResponse = uR?.[0];

  return new Message(
    { default: $.xmlns, ns2: $["xmlns:ns2"], ns3: $["xmlns:ns3"] },
    $.ts,
    $.version,
    uniqueResponse ? toUniqueResponse(uniqueResponse) : UniqueResponse.empty(),
  );
}

function toUniqueResponse(node: UniqueResponseNode): UniqueResponse {
  const timestamp = node.TS?.[0];
  return new UniqueResponse(
    node.$.updateOrigin ?? "",
    timestamp ? toTimestamp(timestamp) : Timestamp.empty(),
  );
}

function toTimestamp(node: TimestampNode): Timestamp {
  return new Timestamp(
    node.$.rid ?? "",
    node.$.ssd ?? "",
    node.$.uid ?? "",
    (node.Location ?? []).map(toLocation),
  );
}

function toLocation(node: LocationNode): Location {
  const attrs = node.$;
  return new Location({
    tpl: attrs.tpl ?? "",
    pta: attrs.pta ?? "",
    ptd: attrs.ptd ?? "",
    wta: attrs.wta ?? "",
    wtd: attrs.wtd ?? "",
    wtp: attrs.wtp ?? "",
    arrival: toEvent(node.arr?.[0]),
    departure: toEvent(node.dep?.[0]),
    pass: toEvent(node.pass?.[0]),
  });
}

function toEvent(node: EventNode | undefined): LocationEvent | undefined {
  if (!node) return undefined;
  return new LocationEvent(node.$.at ?? "", node.$.et ?? "", node.$.src ?? "");
}
