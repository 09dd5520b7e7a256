/**
 * Identifier Resolver
 *
 * Produces the canonical file identifier for a validated request. Explicit
 * identifiers pass through untouched; (year, type) pairs go to the name
 * mapper.
 *
 * @module resolution/identifier-resolver
 */

import type { DatasetRequest, PufNameMapper } from '../core/types.js';

export interface ResolveIdentifierOptions {
  readonly nameMapper: PufNameMapper;
  /** Forwarded to the name mapper, which may consult a remote table */
  readonly preferRemote: boolean;
}

export async function resolveIdentifier(
  request: DatasetRequest,
  options: ResolveIdentifierOptions
): Promise<string> {
  switch (request.kind) {
    case 'identifier':
      return request.identifier;
    case 'year-type': {
      const mapped = await options.nameMapper.mapNameToIdentifier(
        request.year,
        request.type,
        options.preferRemote
      );
      return String(mapped);
    }
  }
}
