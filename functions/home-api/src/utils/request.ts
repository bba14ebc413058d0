/**
 * Request parsing helpers for the home view
 */

import type { NarrowTerm } from '@homeview/page-params';
import { InvalidNarrowError } from './errors';

/**
 * Subdomain of `host` under `rootDomain`
 *
 * @returns '' for the root domain itself, null for foreign hosts
 */
export function subdomainFromHost(host: string, rootDomain: string): string | null {
  const hostname = host.split(':')[0].toLowerCase();
  const root = rootDomain.toLowerCase();
  if (hostname === root) {
    return '';
  }
  if (hostname.endsWith(`.${root}`)) {
    return hostname.slice(0, -(root.length + 1));
  }
  return null;
}

/**
 * Parse the `narrow` query parameter: a JSON list of [operator, operand]
 */
export function parseNarrow(raw: string | undefined): NarrowTerm[] {
  if (raw === undefined || raw === '') {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new InvalidNarrowError('narrow is not valid JSON');
  }

  if (!Array.isArray(parsed)) {
    throw new InvalidNarrowError('narrow must be a list');
  }

  return parsed.map((term: unknown, index) => {
    if (
      !Array.isArray(term) ||
      term.length !== 2 ||
      typeof term[0] !== 'string' ||
      typeof term[1] !== 'string'
    ) {
      throw new InvalidNarrowError(`narrow term ${index} must be an [operator, operand] pair`);
    }
    const pair: NarrowTerm = [term[0], term[1]];
    return pair;
  });
}

/**
 * Narrow for a stream view, with the topic when one is given
 */
export function streamNarrow(stream: string, topic: string | null): NarrowTerm[] {
  const narrow: NarrowTerm[] = [['stream', stream]];
  if (topic !== null) {
    narrow.push(['topic', topic]);
  }
  return narrow;
}

/**
 * Same terms in the same order; stream and topic names ignore case
 */
export function isSameNarrow(a: readonly NarrowTerm[], b: readonly NarrowTerm[]): boolean {
  return (
    a.length === b.length &&
    a.every(
      ([operator, operand], i) =>
        operator === b[i][0] && operand.toLowerCase() === b[i][1].toLowerCase()
    )
  );
}

const DESKTOP_USER_AGENT = /ZulipElectron\/(\d+)\.(\d+)\.(\d+)/;

// Older desktop apps load remote content without sandboxing
const MIN_SECURE_DESKTOP_VERSION = [5, 2, 0] as const;

/**
 * Whether the request comes from a desktop app too old to be trusted
 */
export function isInsecureDesktopApp(userAgent: string | undefined): boolean {
  const match = userAgent ? DESKTOP_USER_AGENT.exec(userAgent) : null;
  if (!match) {
    return false;
  }
  const version = [Number(match[1]), Number(match[2]), Number(match[3])];
  for (let i = 0; i < MIN_SECURE_DESKTOP_VERSION.length; i++) {
    if (version[i] !== MIN_SECURE_DESKTOP_VERSION[i]) {
      return version[i] < MIN_SECURE_DESKTOP_VERSION[i];
    }
  }
  return false;
}
