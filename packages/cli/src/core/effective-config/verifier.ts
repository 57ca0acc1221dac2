import { LayerMismatchError, type IdentityField } from "../errors.js";
import { isEmptyIdentity, loadConfigIdentity, type ConfigIdentity } from "../local-config.js";
import type { MessageSink } from "../messages.js";
import type { LayeredConfig } from "./layered-config.js";

// checked in this order; the first mismatch wins
const IDENTITY_FIELDS: readonly IdentityField[] = ["ide", "linter"];

/**
 * Cross-check the effective `ide`/`linter` against the local layer.
 *
 * Comparison is exact string equality. The diagnostic is written to `messages`
 * before the error is returned, so callers only need to decide pass/fail.
 */
export function verifyLayerConsistency(
  config: LayeredConfig,
  localConfigDisplayPath: string,
  messages: MessageSink,
  readIdentity: (filePath: string) => ConfigIdentity = loadConfigIdentity,
): LayerMismatchError | undefined {
  const effective = config.effective;
  if (!effective || isEmptyIdentity(effective.identity)) return undefined;
  if (!effective.localEchoPath) return undefined;

  const local = readIdentity(effective.localEchoPath);

  for (const field of IDENTITY_FIELDS) {
    const effectiveValue = effective.identity[field];
    if (effectiveValue === local[field]) continue;

    messages.error(
      `'${field}: ${effectiveValue}' is specified in one of the files imported by ${localConfigDisplayPath}; ` +
        `'${field}' is required in the root configuration`,
    );
    messages.error(`Add \`${field}: ${effectiveValue}\` to ${localConfigDisplayPath}`);
    return new LayerMismatchError(field, effectiveValue, local[field]);
  }

  return undefined;
}
