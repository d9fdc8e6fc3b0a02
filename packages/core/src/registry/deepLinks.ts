/**
 * URI pattern registry for deep links.
 *
 * Patterns are paths with `{name}` placeholders, e.g. `product/{id}`. A
 * placeholder matches one non-empty path segment. Patterns are tried in
 * registration order and the first match wins. Scheme is not part of the
 * match.
 */

import queryString from "query-string";
import { throwInvalidArgument } from "../errors.js";
import { createDestination, normalizeParams } from "../tree/nodes.js";
import type { Destination, DestinationParams } from "../tree/types.js";

export const DEFAULT_DEEP_LINK_SCHEME = "app";

export type DeepLink = Readonly<{
  scheme: string;
  /** Path without leading or trailing slashes. */
  path: string;
  queryParams: DestinationParams;
}>;

/** Builds the destination for a matched link. Path params override query params. */
export type DeepLinkFactory = (params: DestinationParams) => Destination;

export type DeepLinkRegistry = Readonly<{
  /**
   * Register `pattern`. A route string stands for a factory creating that
   * route with the link's params.
   */
  register: (pattern: string, target: string | DeepLinkFactory) => void;
  resolve: (uri: string) => Destination | null;
  canHandle: (uri: string) => boolean;
  patterns: () => readonly string[];
}>;

type ParsedQuery = ReturnType<typeof queryString.parseUrl>["query"];

type CompiledPattern = Readonly<{
  pattern: string;
  paramNames: readonly string[];
  regex: RegExp;
  factory: DeepLinkFactory;
}>;

const PLACEHOLDER = /\{([^{}/]+)\}/g;

function trimSlashes(path: string): string {
  return path.replace(/^\/+|\/+$/g, "");
}

function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function queryParamsOf(query: ParsedQuery): DestinationParams {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    // Repeated keys keep the last value; keys without a value are dropped.
    const last = Array.isArray(value) ? value[value.length - 1] : value;
    if (typeof last === "string") out[key] = last;
  }
  return normalizeParams(out);
}

export function parseDeepLink(uri: string): DeepLink {
  const { url, query } = queryString.parseUrl(uri.trim());
  const schemeEnd = url.indexOf("://");
  return Object.freeze({
    scheme: schemeEnd >= 0 ? url.slice(0, schemeEnd) : DEFAULT_DEEP_LINK_SCHEME,
    path: trimSlashes(schemeEnd >= 0 ? url.slice(schemeEnd + 3) : url),
    queryParams: queryParamsOf(query),
  });
}

function compilePattern(pattern: string, factory: DeepLinkFactory): CompiledPattern {
  const path = trimSlashes(pattern.trim());
  if (!path) throwInvalidArgument("deep link pattern must be a non-empty path");

  const paramNames: string[] = [];
  let source = "";
  let lastEnd = 0;
  for (const match of path.matchAll(PLACEHOLDER)) {
    const name = match[1] ?? "";
    if (paramNames.includes(name)) {
      throwInvalidArgument(`deep link pattern "${pattern}" repeats placeholder "${name}"`);
    }
    const start = match.index ?? 0;
    source += `${escapeRegExp(path.slice(lastEnd, start))}([^/]+)`;
    paramNames.push(name);
    lastEnd = start + match[0].length;
  }
  source += escapeRegExp(path.slice(lastEnd));

  return Object.freeze({
    pattern: path,
    paramNames: Object.freeze(paramNames),
    regex: new RegExp(`^${source}$`),
    factory,
  });
}

export function createDeepLinkRegistry(
  initial: Readonly<Record<string, string | DeepLinkFactory>> = {},
): DeepLinkRegistry {
  const compiled: CompiledPattern[] = [];

  function register(pattern: string, target: string | DeepLinkFactory): void {
    const factory: DeepLinkFactory =
      typeof target === "string" ? (params) => createDestination(target, params) : target;
    const entry = compilePattern(pattern, factory);
    if (compiled.some((c) => c.pattern === entry.pattern)) {
      throwInvalidArgument(`deep link pattern "${entry.pattern}" is already registered`);
    }
    compiled.push(entry);
  }

  function match(link: DeepLink): { entry: CompiledPattern; params: DestinationParams } | null {
    for (const entry of compiled) {
      const found = entry.regex.exec(link.path);
      if (!found) continue;
      const params: Record<string, string> = { ...link.queryParams };
      entry.paramNames.forEach((name, i) => {
        params[name] = found[i + 1] ?? "";
      });
      return { entry, params: normalizeParams(params) };
    }
    return null;
  }

  for (const [pattern, target] of Object.entries(initial)) register(pattern, target);

  return Object.freeze({
    register,
    resolve(uri: string): Destination | null {
      const found = match(parseDeepLink(uri));
      return found ? found.entry.factory(found.params) : null;
    },
    canHandle: (uri: string) => match(parseDeepLink(uri)) !== null,
    patterns: () => Object.freeze(compiled.map((entry) => entry.pattern)),
  });
}
