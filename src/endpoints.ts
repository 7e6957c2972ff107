/**
 * StackScope Endpoint Binding
 * Matches outgoing HTTP calls to declared routes by URL shape and verb
 */

import type { AnalyzerConfig } from './config.js';
import type { GraphNode, HttpMethod } from './types.js';

/**
 * URL path segments with scheme, host, query and fragment removed.
 * "https://api.example.com/users/42?x=1" → ["users", "42"]
 */
export function urlSegments(url: string): string[] {
  const withoutHost = url.replace(/^[a-z][a-z0-9+.-]*:\/\/[^/]*/i, '').replace(/^\/\/[^/]*/, '');
  const pathOnly = withoutHost.split(/[?#]/)[0];
  return pathOnly.split('/').filter((s) => s.length > 0);
}

/**
 * Lowercased host of an absolute or protocol-relative URL, without port
 * or credentials. Null for paths and for hosts written as a template hole.
 */
export function urlHost(url: string): string | null {
  const match = /^(?:[a-z][a-z0-9+.-]*:)?\/\/([^/?#]*)/i.exec(url);
  if (!match) return null;
  const host = match[1].replace(/^.*@/, '').replace(/:\d+$/, '').toLowerCase();
  if (host === '' || /[*{}$<>]/.test(host)) return null;
  return host;
}

/**
 * ":id", "{id}", "<int:id>", "[id]", "*" and any segment with a template hole
 */
export function isWildcardSegment(segment: string): boolean {
  return (
    segment.startsWith(':') ||
    /^\{.*\}$/.test(segment) ||
    /^<.*>$/.test(segment) ||
    /^\[.*\]$/.test(segment) ||
    segment.includes('*')
  );
}

export function methodMatches(call: HttpMethod, route: HttpMethod): boolean {
  return route === 'ANY' || call === 'ANY' || call === route;
}

/**
 * Positional comparison. Returns the number of wildcard pairs, or null.
 */
function compareSegments(call: string[], route: string[]): number | null {
  if (call.length !== route.length) return null;
  let wildcards = 0;
  let literals = 0;
  for (let i = 0; i < call.length; i++) {
    const a = call[i];
    const b = route[i];
    if (isWildcardSegment(a) || isWildcardSegment(b)) {
      wildcards++;
    } else if (a === b) {
      literals++;
    } else {
      return null;
    }
  }
  if (literals === 0 && call.length > 0) return null;
  return wildcards;
}

/**
 * Confidence that a call URL targets a route, or null when it cannot.
 * Always below 1.0: URL matching is never syntactic. Calls to a host
 * outside `firstPartyHosts` never bind.
 */
export function matchUrl(callUrl: string, routePath: string, binding: AnalyzerConfig['binding']): number | null {
  const host = urlHost(callUrl);
  if (host !== null && !binding.firstPartyHosts.includes(host)) return null;

  const call = urlSegments(callUrl);
  const route = urlSegments(routePath);
  if (call.length > 0 && call.every(isWildcardSegment)) return null;

  const score = (base: number, wildcards: number) => {
    const value = Math.round((base - binding.wildcardPenalty * wildcards) * 1000) / 1000;
    return Math.min(0.99, Math.max(binding.minConfidence, value));
  };

  const exact = compareSegments(call, route);
  if (exact !== null) return score(binding.exactConfidence, exact);

  // `${API_BASE}/users` → leading hole stands for the base URL
  if (call.length > 0 && isWildcardSegment(call[0])) {
    const rest = compareSegments(call.slice(1), route);
    if (rest !== null) return score(binding.exactConfidence, rest + 1);
  }

  // Router mounted under a prefix: "/api/v1/users" against "/users"
  if (route.length > 0 && call.length > route.length) {
    const tail = compareSegments(call.slice(call.length - route.length), route);
    if (tail !== null) return score(binding.suffixConfidence, tail);
  }

  return null;
}

export interface EndpointMatch {
  endpoint: GraphNode;
  confidence: number;
}

/**
 * Endpoints a call binds to: every match in the highest-confidence tier
 */
export function findEndpointMatches(
  call: { method: HttpMethod; url: string },
  endpoints: readonly GraphNode[],
  binding: AnalyzerConfig['binding']
): EndpointMatch[] {
  let best = -1;
  let matches: EndpointMatch[] = [];

  for (const endpoint of endpoints) {
    if (!endpoint.route || !methodMatches(call.method, endpoint.route.method)) continue;
    const confidence = matchUrl(call.url, endpoint.route.path, binding);
    if (confidence === null) continue;

    if (confidence > best) {
      best = confidence;
      matches = [{ endpoint, confidence }];
    } else if (confidence === best) {
      matches.push({ endpoint, confidence });
    }
  }

  return matches;
}
