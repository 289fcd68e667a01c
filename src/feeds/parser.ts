/**
 * FeedSync — Feed Document Parser
 *
 * Turns RSS 2.0, RSS 1.0 (RDF) and Atom documents into a ParsedFeed.
 * Anything else, or malformed XML, is reported as an unparseable fetch.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { CandidateEntry, ParsedFeed } from '../types';
import { FetchFailedError } from '../lib/errors';
import { parseFeedDate } from './dates';

type XmlNode = Record<string, unknown>;

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (name) => name === 'item' || name === 'entry',
});

// ============================================================
// NODE HELPERS
// ============================================================

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function nodesOf(value: unknown): XmlNode[] {
  return asArray(value).filter(isNode);
}

/**
 * Text content of an element, whether it was parsed as a bare string or
 * as a node carrying attributes. Empty text counts as absent.
 */
function textOf(value: unknown): string | undefined {
  if (Array.isArray(value)) return textOf(value[0]);
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isNode(value)) return textOf(value['#text']);
  return undefined;
}

// ============================================================
// RSS 2.0 / RSS 1.0
// ============================================================

function rssEntry(item: XmlNode): CandidateEntry {
  return {
    guid: textOf(item.guid) ?? textOf(item['@_rdf:about']),
    link: textOf(item.link),
    title: textOf(item.title) ?? '',
    publishedAt: parseFeedDate(textOf(item.pubDate) ?? textOf(item['dc:date'])),
    summary: textOf(item.description) ?? textOf(item['content:encoded']),
  };
}

function parseRss(rss: XmlNode): ParsedFeed {
  const channel = rss.channel;
  if (!isNode(channel)) {
    throw new FetchFailedError('unparseable', 'RSS document has no channel');
  }

  return {
    title: textOf(channel.title),
    description: textOf(channel.description),
    entries: nodesOf(channel.item).map(rssEntry),
  };
}

function parseRdf(rdf: XmlNode): ParsedFeed {
  const channel: XmlNode = nodesOf(rdf.channel)[0] ?? {};

  return {
    title: textOf(channel.title),
    description: textOf(channel.description),
    // RSS 1.0 puts items beside the channel, not inside it
    entries: nodesOf(rdf.item).map(rssEntry),
  };
}

// ============================================================
// ATOM
// ============================================================

/**
 * Prefer the alternate link; fall back to the first one.
 */
function atomLink(value: unknown): string | undefined {
  const links = asArray(value);
  const hrefOf = (link: unknown) => (isNode(link) ? textOf(link['@_href']) : textOf(link));

  const alternate = links.find(
    link => isNode(link) && (link['@_rel'] === undefined || link['@_rel'] === 'alternate')
  );
  return hrefOf(alternate ?? links[0]);
}

function atomEntry(entry: XmlNode): CandidateEntry {
  return {
    guid: textOf(entry.id),
    link: atomLink(entry.link),
    title: textOf(entry.title) ?? '',
    publishedAt: parseFeedDate(textOf(entry.published) ?? textOf(entry.updated)),
    summary: textOf(entry.summary) ?? textOf(entry.content),
  };
}

function parseAtom(feed: XmlNode): ParsedFeed {
  return {
    title: textOf(feed.title),
    description: textOf(feed.subtitle),
    entries: nodesOf(feed.entry).map(atomEntry),
  };
}

// ============================================================
// ENTRY POINT
// ============================================================

export function parseFeedDocument(xml: string): ParsedFeed {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new FetchFailedError(
      'unparseable',
      `Malformed XML: ${validation.err.msg} (line ${validation.err.line})`
    );
  }

  const doc: unknown = xmlParser.parse(xml);
  if (!isNode(doc)) {
    throw new FetchFailedError('unparseable', 'Empty document');
  }

  const { rss, feed } = doc;
  const rdf = doc['rdf:RDF'];

  if (isNode(rss)) return parseRss(rss);
  if (isNode(rdf)) return parseRdf(rdf);
  if (isNode(feed)) return parseAtom(feed);

  throw new FetchFailedError('unparseable', 'Unsupported document: expected RSS or Atom');
}
