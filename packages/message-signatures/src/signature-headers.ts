/**
 * Signature and Signature-Input header parsing (RFC 9421 Section 4)
 *
 * Both headers are structured field dictionaries keyed by signature label:
 *
 *   Signature-Input: install=("@method" "approov-token");alg="ecdsa-p256-sha256";created=1744292750
 *   Signature: install=:MEUCIQDX...:
 */

import { FailureKinds, fail, succeed, type StepResult } from './errors.js';
import { combineHeaderValues, getHeaderValues, type HeaderMap } from './request.js';
import {
  parseDictionary,
  type Parameters,
  type StructuredDictionary,
  type StructuredItem,
} from './structured-fields/index.js';

export interface SignatureEntry {
  label: string;
  signature: Uint8Array;
}

export interface SignatureInputEntry {
  label: string;
  components: StructuredItem[];
  params: Parameters;
}

export interface ParsedSignature {
  signature: SignatureEntry;
  input: SignatureInputEntry;
}

/**
 * Read a dictionary-valued header. Several field lines are combined with ","
 * before parsing. Returns undefined when the header is absent or blank.
 */
export function readDictionaryHeader(
  headers: HeaderMap,
  name: string
): StepResult<StructuredDictionary> | undefined {
  const values = getHeaderValues(headers, name);
  if (values === undefined) {
    return undefined;
  }

  const raw = combineHeaderValues(values, ',');
  if (raw.trim() === '') {
    return undefined;
  }

  const parsed = parseDictionary(raw);
  if (parsed.error) {
    return fail(FailureKinds.MALFORMED_HEADER, `Failed to parse ${name} header: ${parsed.error.message}`);
  }
  return succeed(parsed.value);
}

/**
 * Parse Signature and Signature-Input and select the entry for `label`.
 *
 * The two headers must carry exactly the same set of labels.
 */
export function parseSignatureHeaders(headers: HeaderMap, label: string): StepResult<ParsedSignature> {
  const signatures = readDictionaryHeader(headers, 'signature');
  const inputs = readDictionaryHeader(headers, 'signature-input');

  if (signatures === undefined || inputs === undefined) {
    return fail(FailureKinds.MALFORMED_HEADER, 'Missing Signature or Signature-Input headers');
  }
  if (!signatures.ok) {
    return signatures;
  }
  if (!inputs.ok) {
    return inputs;
  }

  for (const key of signatures.value.keys()) {
    if (!inputs.value.has(key)) {
      return fail(FailureKinds.MALFORMED_HEADER, `Signature label '${key}' has no Signature-Input entry`);
    }
  }
  for (const key of inputs.value.keys()) {
    if (!signatures.value.has(key)) {
      return fail(FailureKinds.MALFORMED_HEADER, `Signature-Input label '${key}' has no Signature entry`);
    }
  }

  const signatureItem = signatures.value.get(label);
  const inputItem = inputs.value.get(label);
  if (!signatureItem || !inputItem) {
    return fail(FailureKinds.MALFORMED_HEADER, `Signature headers missing '${label}' entry`);
  }

  if (signatureItem.value.type !== 'byte-sequence') {
    return fail(FailureKinds.MALFORMED_HEADER, 'Signature item is not encoded as a byte sequence');
  }
  if (inputItem.value.type !== 'inner-list') {
    return fail(
      FailureKinds.MALFORMED_HEADER,
      'Signature-Input entry does not contain an inner list of components'
    );
  }

  return succeed({
    signature: { label, signature: signatureItem.value.value },
    input: { label, components: inputItem.value.value, params: inputItem.params },
  });
}
