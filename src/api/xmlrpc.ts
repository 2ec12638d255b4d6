/**
 * XML-RPC over HTTP.
 *
 * Method calls are serialized with fast-xml-parser's XMLBuilder and posted with
 * axios; responses are parsed in order-preserving mode and converted into plain
 * values. `<base64>` and `<dateTime.iso8601>` are surfaced as their text so that
 * large payloads can be decoded incrementally by the caller.
 */

import axios, { isAxiosError } from 'axios';
import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { mapHttpError } from '../errors/handler';
import { ResultParseError, RpcError } from '../errors/types';
import { logger } from '../utils/logger';

export type XmlRpcValue = string | number | boolean | null | XmlRpcValue[] | XmlRpcStruct;

export interface XmlRpcStruct {
  [member: string]: XmlRpcValue;
}

/** Posts a serialized call and resolves with the response body */
export type XmlRpcTransport = (body: string) => Promise<string>;

export interface RpcCaller {
  call(method: string, params?: XmlRpcValue[]): Promise<XmlRpcValue>;
}

// Subtitle payloads travel inside the response body
export const MAX_RESPONSE_SIZE = 10 * 1024 * 1024;
const DEFAULT_TIMEOUT_MS = 60_000;

type XmlTree = { [tag: string]: XmlTree | XmlTree[] | string | number };

interface XmlElement {
  tag: string;
  children: XmlNode[];
}

type XmlNode = XmlElement | string;

const builder = new XMLBuilder({
  format: false,
  suppressEmptyNode: false,
});

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  // String content is kept verbatim; numeric character references are decoded
  trimValues: false,
  htmlEntities: true,
});

function encodeValue(value: XmlRpcValue): XmlTree {
  if (value === null) {
    return { nil: '' };
  }
  if (typeof value === 'string') {
    return { string: value };
  }
  if (typeof value === 'boolean') {
    return { boolean: value ? 1 : 0 };
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { int: value } : { double: value };
  }
  if (Array.isArray(value)) {
    return { array: { data: { value: value.map(encodeValue) } } };
  }
  return {
    struct: {
      member: Object.entries(value).map(([name, member]) => ({
        name,
        value: encodeValue(member),
      })),
    },
  };
}

export function encodeMethodCall(method: string, params: XmlRpcValue[]): string {
  const body = builder.build({
    methodCall: {
      methodName: method,
      params: { param: params.map((param) => ({ value: encodeValue(param) })) },
    },
  });
  return `<?xml version="1.0"?>\n${body}`;
}

function toNodes(raw: unknown): XmlNode[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const entries: unknown[] = raw;
  const nodes: XmlNode[] = [];
  for (const entry of entries) {
    if (typeof entry !== 'object' || entry === null) {
      continue;
    }
    for (const [key, content] of Object.entries(entry)) {
      if (key === '#text') {
        nodes.push(String(content));
      } else if (key !== ':@' && !key.startsWith('?')) {
        nodes.push({ tag: key, children: toNodes(content) });
      }
    }
  }
  // Indentation between elements is not content
  if (nodes.some((node) => typeof node !== 'string')) {
    return nodes.filter((node) => typeof node !== 'string' || node.trim().length > 0);
  }
  return nodes;
}

function elementsOf(nodes: XmlNode[]): XmlElement[] {
  return nodes.filter((node): node is XmlElement => typeof node !== 'string');
}

function textOf(nodes: XmlNode[]): string {
  return nodes.filter((node): node is string => typeof node === 'string').join('');
}

function childOf(element: XmlElement, tag: string): XmlElement | undefined {
  return elementsOf(element.children).find((child) => child.tag === tag);
}

function requireChild(element: XmlElement, tag: string): XmlElement {
  const child = childOf(element, tag);
  if (!child) {
    throw new ResultParseError(tag, `<${element.tag}> has no <${tag}> element`);
  }
  return child;
}

function decodeValue(valueElement: XmlElement): XmlRpcValue {
  const typed = elementsOf(valueElement.children)[0];
  if (!typed) {
    // An untyped <value> is a string
    return textOf(valueElement.children);
  }

  const text = textOf(typed.children);
  const scalar = text.trim();
  switch (typed.tag) {
    case 'string':
      return text;

    case 'base64':
    case 'dateTime.iso8601':
      return scalar;

    case 'int':
    case 'i4':
    case 'i8': {
      const parsed = Number.parseInt(scalar, 10);
      if (Number.isNaN(parsed)) {
        throw new ResultParseError(typed.tag, `Invalid integer: ${scalar}`);
      }
      return parsed;
    }

    case 'double': {
      const parsed = Number(scalar);
      if (scalar.length === 0 || Number.isNaN(parsed)) {
        throw new ResultParseError(typed.tag, `Invalid double: ${scalar}`);
      }
      return parsed;
    }

    case 'boolean':
      return scalar === '1' || scalar === 'true';

    case 'nil':
      return null;

    case 'array': {
      const data = childOf(typed, 'data');
      if (!data) {
        return [];
      }
      return elementsOf(data.children)
        .filter((child) => child.tag === 'value')
        .map(decodeValue);
    }

    case 'struct': {
      const struct: XmlRpcStruct = {};
      for (const member of elementsOf(typed.children)) {
        if (member.tag !== 'member') {
          continue;
        }
        const name = textOf(requireChild(member, 'name').children).trim();
        struct[name] = decodeValue(requireChild(member, 'value'));
      }
      return struct;
    }

    default:
      throw new ResultParseError(typed.tag, `Unsupported XML-RPC type <${typed.tag}>`);
  }
}

function faultFrom(value: XmlRpcValue): RpcError {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    const code = value.faultCode;
    const message = value.faultString;
    return new RpcError(
      typeof code === 'number' ? code : 0,
      typeof message === 'string' ? message : 'Unknown fault'
    );
  }
  return new RpcError(0, 'Malformed fault response');
}

/**
 * Parse a methodResponse document. Throws RpcError for a <fault>.
 */
export function parseMethodResponse(xml: string): XmlRpcValue {
  const root = elementsOf(toNodes(parser.parse(xml))).find(
    (element) => element.tag === 'methodResponse'
  );
  if (!root) {
    throw new ResultParseError('methodResponse', 'Response is not an XML-RPC methodResponse');
  }

  const fault = childOf(root, 'fault');
  if (fault) {
    throw faultFrom(decodeValue(requireChild(fault, 'value')));
  }

  const param = requireChild(requireChild(root, 'params'), 'param');
  return decodeValue(requireChild(param, 'value'));
}

export interface HttpTransportOptions {
  userAgent?: string;
  timeout?: number;
}

export function createHttpTransport(
  endpoint: string,
  options: HttpTransportOptions = {}
): XmlRpcTransport {
  const headers: Record<string, string> = { 'Content-Type': 'text/xml' };
  if (options.userAgent) {
    headers['User-Agent'] = options.userAgent;
  }

  const client = axios.create({
    timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
    headers,
    responseType: 'text',
    maxContentLength: MAX_RESPONSE_SIZE,
  });

  return async (body: string) => {
    const response = await client.post<string>(endpoint, body);
    return response.data;
  };
}

export class XmlRpcClient implements RpcCaller {
  constructor(private transport: XmlRpcTransport) {}

  async call(method: string, params: XmlRpcValue[] = []): Promise<XmlRpcValue> {
    logger.debug(`XML-RPC call: ${method}`);

    let responseXml: string;
    try {
      responseXml = await this.transport(encodeMethodCall(method, params));
    } catch (error) {
      throw isAxiosError(error) ? mapHttpError(error) : error;
    }

    return parseMethodResponse(responseXml);
  }
}
