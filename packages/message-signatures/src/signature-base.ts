/**
 * Signature base construction per RFC 9421 Section 2.5.
 *
 * One line per covered component, in the order the client listed them,
 * followed by the "@signature-params" line. Lines are joined with "\n" and
 * there is no trailing newline.
 */

import { resolveComponent } from './components.js';
import { succeed, type StepResult } from './errors.js';
import type { SignedRequest } from './request.js';
import {
  serializeInnerList,
  serializeItem,
  type Parameters,
  type StructuredItem,
} from './structured-fields/index.js';

/**
 * Build the signature base for a request.
 *
 * @param components - Covered component identifiers from Signature-Input
 * @param params - Signature parameters attached to the component list
 */
export function buildSignatureBase(
  request: SignedRequest,
  components: StructuredItem[],
  params: Parameters
): StepResult<string> {
  const lines: string[] = [];

  for (const component of components) {
    const resolved = resolveComponent(request, component);
    if (!resolved.ok) {
      return resolved;
    }
    lines.push(`${serializeItem(component)}: ${resolved.value}`);
  }

  lines.push(`"@signature-params": ${serializeInnerList(components, params)}`);

  return succeed(lines.join('\n'));
}

/**
 * Encode a signature base for signing or verification
 */
export function signatureBaseToBytes(signatureBase: string): Uint8Array {
  return new TextEncoder().encode(signatureBase);
}
