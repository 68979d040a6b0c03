/**
 * CLF SOAP envelopes and payload parsing
 *
 * Every CLF result is a string holding a second XML document, so responses are
 * parsed twice: once for the SOAP envelope, once for the inner payload.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedResponseError } from '../errors.js';
import type { ClfOperation } from './types.js';

export const CLF_NAMESPACE = 'http://services.clfdistribution.com/CLFWebOrdering';
export const SOAP_ENVELOPE_NAMESPACE = 'http://schemas.xmlsoap.org/soap/envelope/';

/** Header error the service returns, with HTTP 200, once a token is stale */
export const AUTH_REQUIRED_MARKER = 'Please call GetAuthenticationToken() first';

const parser = new XMLParser({
  removeNSPrefix: true,
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
});

// ============================================================================
// Envelope Builders
// ============================================================================

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function buildEnvelope(operation: ClfOperation, body: string, token?: string): string {
  const header =
    token === undefined
      ? `<WebServiceHeader xmlns="${CLF_NAMESPACE}" />`
      : `<WebServiceHeader xmlns="${CLF_NAMESPACE}"><AuthenticationToken>${escapeXml(token)}</AuthenticationToken></WebServiceHeader>`;

  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    `<soap:Envelope xmlns:soap="${SOAP_ENVELOPE_NAMESPACE}" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xmlns:xsd="http://www.w3.org/2001/XMLSchema">`,
    `<soap:Header>${header}</soap:Header>`,
    `<soap:Body><${operation} xmlns="${CLF_NAMESPACE}">${body}</${operation}></soap:Body>`,
    '</soap:Envelope>',
  ].join('\n');
}

/** Inner `productCodesXml` argument, escaped once more for embedding */
function productCodesXml(code: string): string {
  return `<productCodesXml>${escapeXml(`<ProductCodes><Code>${escapeXml(code)}</Code></ProductCodes>`)}</productCodesXml>`;
}

export function authenticationEnvelope(username: string, password: string): string {
  return buildEnvelope(
    'GetAuthenticationToken',
    `<Username>${escapeXml(username)}</Username><Password>${escapeXml(password)}</Password>`
  );
}

export function productCodesEnvelope(token: string): string {
  return buildEnvelope('GetProductCodes', '', token);
}

export function productStockEnvelope(token: string, code: string): string {
  return buildEnvelope('GetProductStock', productCodesXml(code), token);
}

export function productDataEnvelope(token: string, code: string): string {
  return buildEnvelope('GetProductData', productCodesXml(code), token);
}

// ============================================================================
// Tree Navigation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Depth-first search for every element named `tag`. Repeated siblings arrive
 * from the parser as arrays and are flattened.
 */
export function findAll(node: unknown, tag: string): unknown[] {
  const found: unknown[] = [];
  const visit = (current: unknown): void => {
    if (Array.isArray(current)) {
      current.forEach(visit);
      return;
    }
    if (!isRecord(current)) return;
    for (const [key, value] of Object.entries(current)) {
      if (key === tag) {
        if (Array.isArray(value)) {
          found.push(...value);
        } else {
          found.push(value);
        }
      }
      visit(value);
    }
  };
  visit(node);
  return found;
}

export function findFirst(node: unknown, tag: string): unknown {
  return findAll(node, tag)[0];
}

/**
 * Direct child of an element, first occurrence
 */
export function childOf(node: unknown, tag: string): unknown {
  if (!isRecord(node)) return undefined;
  const value = node[tag];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Text content of a leaf element; null when absent or empty
 */
export function textOf(node: unknown): string | null {
  if (typeof node === 'string') {
    return node.length > 0 ? node : null;
  }
  if (typeof node === 'number' || typeof node === 'boolean') {
    return String(node);
  }
  if (isRecord(node) && typeof node['#text'] === 'string') {
    return node['#text'].length > 0 ? node['#text'] : null;
  }
  return null;
}

// ============================================================================
// Parsing
// ============================================================================

export function parseXml(xml: string, operation: string, what: string): unknown {
  if (xml.trim().length === 0) {
    throw new MalformedResponseError(operation, `empty ${what}`);
  }
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new MalformedResponseError(
      operation,
      `${what} is not well-formed XML (line ${validation.err.line}: ${validation.err.msg})`
    );
  }
  const parsed: unknown = parser.parse(xml);
  return parsed;
}

export function parseEnvelope(xml: string, operation: ClfOperation): unknown {
  const envelope = parseXml(xml, operation, 'SOAP envelope');
  if (findFirst(envelope, 'Envelope') === undefined) {
    throw new MalformedResponseError(operation, 'SOAP Envelope element missing');
  }
  return envelope;
}

/**
 * True when the envelope's WebServiceHeader carries the re-authentication
 * marker. Any other shape is read as "not expired".
 */
export function detectExpiry(envelope: unknown): boolean {
  return findAll(envelope, 'WebServiceHeader').some((header) => {
    const message = textOf(childOf(header, 'ErrorMessage'));
    return message !== null && message.trim() === AUTH_REQUIRED_MARKER;
  });
}

/**
 * Text of `<{operation}Result>`, which for every operation but
 * GetAuthenticationToken is itself an XML document
 */
export function readResult(envelope: unknown, operation: ClfOperation): string | null {
  return textOf(findFirst(envelope, `${operation}Result`));
}
