// ============================================================================
// ipns-dataset-client — Snapshot Document Parsing
// ============================================================================

import { z } from 'zod';
import { MalformedSnapshotError } from './errors.js';
import type { ImmutableContentId, VersionSnapshot } from './types.js';

/**
 * Link relations that point at the predecessor snapshot. Older chains were
 * published with `prev`.
 */
export const PREVIOUS_LINK_RELS: ReadonlySet<string> = new Set(['previous', 'prev']);

const TIMESTAMP_RX = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

// DAG-JSON link: { "/": "<cid>" }
const CidLinkSchema = z.object({ '/': z.string().min(1) });

const SnapshotLinkSchema = z
  .object({
    rel: z.string(),
    'metadata href': CidLinkSchema.optional(),
  })
  .passthrough();

const SnapshotDocumentSchema = z
  .object({
    properties: z.object({ updated: z.string() }).passthrough(),
    links: z.array(SnapshotLinkSchema).default([]),
    assets: z
      .object({
        analytic: z.object({ href: CidLinkSchema }).passthrough(),
      })
      .passthrough(),
  })
  .passthrough();

type SnapshotLink = z.infer<typeof SnapshotLinkSchema>;

/**
 * Parse a `YYYY-MM-DDTHH:MM:SSZ` timestamp.
 *
 * @returns The instant, or `undefined` if the string is not in that exact
 *          form or names an impossible date.
 */
export function parseSnapshotTimestamp(value: string): Date | undefined {
  const m = TIMESTAMP_RX.exec(value);
  if (!m) return undefined;

  const [year, month, day, hour, minute, second] = m.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  // Date.UTC rolls 2024-02-30 over to March; reject instead.
  if (date.toISOString() !== `${value.slice(0, -1)}.000Z`) return undefined;
  return date;
}

/**
 * Locate the predecessor id among a snapshot's links.
 *
 * @throws {MalformedSnapshotError} If a previous-link has no target, or
 *         several previous-links disagree.
 */
function findPreviousId(
  contentId: ImmutableContentId,
  links: readonly SnapshotLink[],
): ImmutableContentId | undefined {
  const targets = new Set<string>();
  for (const link of links) {
    if (!PREVIOUS_LINK_RELS.has(link.rel)) continue;
    const target = link['metadata href']?.['/'];
    if (!target) {
      throw new MalformedSnapshotError(contentId, `"${link.rel}" link has no metadata href`);
    }
    targets.add(target);
  }

  if (targets.size > 1) {
    throw new MalformedSnapshotError(contentId, `conflicting previous links: ${[...targets].join(', ')}`);
  }
  return targets.values().next().value;
}

/**
 * Turn a raw metadata document into a {@link VersionSnapshot}.
 *
 * @param contentId - CID the document was fetched under.
 * @param raw       - Parsed JSON as returned by the snapshot store.
 * @throws {MalformedSnapshotError} If required fields are missing or invalid.
 */
export function parseSnapshot(contentId: ImmutableContentId, raw: unknown): VersionSnapshot {
  const result = SnapshotDocumentSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new MalformedSnapshotError(contentId, detail);
  }

  const doc = result.data;
  const createdAt = parseSnapshotTimestamp(doc.properties.updated);
  if (!createdAt) {
    throw new MalformedSnapshotError(
      contentId,
      `properties.updated "${doc.properties.updated}" is not a YYYY-MM-DDTHH:MM:SSZ timestamp`,
    );
  }

  return {
    contentId,
    createdAt,
    previous: findPreviousId(contentId, doc.links),
    payloadRef: doc.assets.analytic.href['/'],
    document: doc,
  };
}
