/**
 * Covered component resolution (RFC 9421 Section 2)
 *
 * Resolves one component identifier from Signature-Input against the live
 * request. Derived components (`@method`, `@path`, ...) are projected from the
 * request's own fields; anything else names a header field.
 */

import { FailureKinds, fail, succeed, type StepResult } from './errors.js';
import { combineHeaderValues, getHeaderValues, type SignedRequest } from './request.js';
import {
  parseDictionary,
  parseItem,
  parseList,
  serializeDictionary,
  serializeItem,
  serializeList,
  type BareItem,
  type StructuredItem,
} from './structured-fields/index.js';

/**
 * Header parameters this resolver does not implement. Ignoring them would sign
 * over a different value than the client intended.
 */
const UNSUPPORTED_HEADER_PARAMS = ['bs', 'req', 'tr'];

export const DERIVED_COMPONENTS = [
  '@method',
  '@target-uri',
  '@authority',
  '@scheme',
  '@request-target',
  '@path',
  '@query',
  '@query-param',
] as const;

export type DerivedComponent = (typeof DERIVED_COMPONENTS)[number];

const DERIVED_COMPONENT_NAMES = new Set<string>(DERIVED_COMPONENTS);

/**
 * Resolve the canonical value of a covered component
 */
export function resolveComponent(request: SignedRequest, component: StructuredItem): StepResult<string> {
  if (component.value.type !== 'string') {
    return fail(
      FailureKinds.UNRESOLVABLE_COMPONENT,
      `Unsupported component type '${component.value.type}' in signature input`
    );
  }

  const name = component.value.value;
  if (name.startsWith('@')) {
    return resolveDerivedComponent(request, name, component);
  }
  return resolveHeaderComponent(request, name, component);
}

function isDerivedComponent(name: string): name is DerivedComponent {
  return DERIVED_COMPONENT_NAMES.has(name);
}

function resolveDerivedComponent(
  request: SignedRequest,
  name: string,
  component: StructuredItem
): StepResult<string> {
  if (!isDerivedComponent(name)) {
    return fail(FailureKinds.UNRESOLVABLE_COMPONENT, `Unsupported derived component '${name}'`);
  }

  switch (name) {
    case '@method':
      return succeed(request.method.toUpperCase());
    case '@target-uri':
      return succeed(`${request.scheme.toLowerCase()}://${request.authority.toLowerCase()}${requestTarget(request)}`);
    case '@authority':
      return succeed(request.authority.toLowerCase());
    case '@scheme':
      return succeed(request.scheme.toLowerCase());
    case '@request-target':
      return succeed(requestTarget(request));
    case '@path':
      return succeed(request.path || '/');
    case '@query':
      return succeed(request.query);
    case '@query-param':
      return resolveQueryParam(request, component);
  }
}

/**
 * Origin-form request target: path plus "?query" when a query is present
 */
function requestTarget(request: SignedRequest): string {
  const path = request.path || '/';
  return request.query ? `${path}?${request.query}` : path;
}

function resolveQueryParam(request: SignedRequest, component: StructuredItem): StepResult<string> {
  const nameParam = component.params.get('name');
  if (nameParam?.type !== 'string') {
    return fail(FailureKinds.UNRESOLVABLE_COMPONENT, "@query-param requires a 'name' parameter");
  }

  const values = new URLSearchParams(request.query).getAll(nameParam.value);
  if (values.length === 0) {
    return fail(
      FailureKinds.UNRESOLVABLE_COMPONENT,
      `Missing query parameter '${nameParam.value}' for @query-param component`
    );
  }

  return succeed(values.join(','));
}

function resolveHeaderComponent(
  request: SignedRequest,
  name: string,
  component: StructuredItem
): StepResult<string> {
  for (const param of UNSUPPORTED_HEADER_PARAMS) {
    if (component.params.has(param)) {
      return fail(
        FailureKinds.UNRESOLVABLE_COMPONENT,
        `Unsupported '${param}' parameter on component '${name}'`
      );
    }
  }

  const values = getHeaderValues(request.headers, name);
  if (values === undefined) {
    return fail(FailureKinds.UNRESOLVABLE_COMPONENT, `Missing header '${name}' referenced in signature`);
  }

  const raw = combineHeaderValues(values);

  if (isTrue(component.params.get('sf'))) {
    return reserializeStructuredHeader(name, raw);
  }

  const key = component.params.get('key');
  if (key !== undefined) {
    if (key.type !== 'string') {
      return fail(FailureKinds.UNRESOLVABLE_COMPONENT, `'key' parameter on '${name}' must be a string`);
    }
    return resolveDictionaryMember(name, raw, key.value);
  }

  return succeed(raw);
}

function isTrue(value: BareItem | undefined): boolean {
  return value?.type === 'boolean' && value.value;
}

/**
 * Strict serialization of a structured header: dictionary, else list, else item
 */
function reserializeStructuredHeader(name: string, raw: string): StepResult<string> {
  const dictionary = parseDictionary(raw);
  if (!dictionary.error) {
    return succeed(serializeDictionary(dictionary.value));
  }

  const list = parseList(raw);
  if (!list.error) {
    return succeed(serializeList(list.value));
  }

  const item = parseItem(raw);
  if (!item.error) {
    return succeed(serializeItem(item.value));
  }

  return fail(
    FailureKinds.UNRESOLVABLE_COMPONENT,
    `Failed to parse header '${name}' as structured field value: ${dictionary.error.message}`
  );
}

function resolveDictionaryMember(name: string, raw: string, key: string): StepResult<string> {
  const dictionary = parseDictionary(raw);
  if (dictionary.error) {
    return fail(
      FailureKinds.UNRESOLVABLE_COMPONENT,
      `Failed to parse header '${name}' as dictionary: ${dictionary.error.message}`
    );
  }

  const member = dictionary.value.get(key);
  if (!member) {
    return fail(FailureKinds.UNRESOLVABLE_COMPONENT, `Header '${name}' dictionary missing key '${key}'`);
  }

  return succeed(serializeItem(member));
}
