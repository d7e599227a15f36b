import { SaxesParser } from "saxes";
import type { SaxesTag } from "saxes";

export interface XmlTag {
  /** Qualified name as written, e.g. `x:row` */
  name: string;
  /** Name without namespace prefix, e.g. `row` */
  local: string;
  /** Attributes by qualified name */
  attributes: Record<string, string>;
  isSelfClosing: boolean;
}

export type SaxEvent =
  | { eventType: "opentag"; value: XmlTag }
  | { eventType: "text"; value: string }
  | { eventType: "closetag"; value: XmlTag };

export function localName(name: string): string {
  const idx = name.indexOf(":");
  return idx === -1 ? name : name.slice(idx + 1);
}

/**
 * Attribute lookup by local name, so `r:id` and `ns1:id` both answer `id`.
 * An exact, unprefixed match wins.
 */
export function getAttribute(tag: XmlTag, name: string): string | undefined {
  const exact = tag.attributes[name];
  if (exact !== undefined) {
    return exact;
  }
  for (const [key, value] of Object.entries(tag.attributes)) {
    if (key.includes(":") && localName(key) === name) {
      return value;
    }
  }
  return undefined;
}

function toXmlTag(tag: SaxesTag): XmlTag {
  const attributes: Record<string, string> = {};
  for (const [key, value] of Object.entries<string | { value: string }>(tag.attributes)) {
    attributes[key] = typeof value === "string" ? value : value.value;
  }
  return {
    name: tag.name,
    local: localName(tag.name),
    attributes,
    isSelfClosing: tag.isSelfClosing
  };
}

/**
 * Pull-parse an XML byte stream.
 *
 * Yields the events produced by each input chunk as one batch, so the caller
 * drives the parse: nothing is read ahead of what the caller consumes.
 * Throws the parser's error on malformed or truncated input.
 */
export async function* parseSax(
  iterable: AsyncIterable<Uint8Array | string>
): AsyncGenerator<SaxEvent[]> {
  const parser = new SaxesParser();
  const decoder = new TextDecoder("utf-8");
  let error: Error | undefined;
  let events: SaxEvent[] = [];

  parser.on("error", err => {
    error ??= err;
  });
  parser.on("opentag", tag => {
    events.push({ eventType: "opentag", value: toXmlTag(tag) });
  });
  parser.on("text", value => {
    events.push({ eventType: "text", value });
  });
  parser.on("cdata", value => {
    events.push({ eventType: "text", value });
  });
  parser.on("closetag", tag => {
    events.push({ eventType: "closetag", value: toXmlTag(tag) });
  });

  for await (const chunk of iterable) {
    parser.write(typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true }));
    if (error) {
      throw error;
    }
    if (events.length) {
      yield events;
      events = [];
    }
  }

  const rest = decoder.decode();
  if (rest) {
    parser.write(rest);
  }
  parser.close();
  if (error) {
    throw error;
  }
  if (events.length) {
    yield events;
  }
}
