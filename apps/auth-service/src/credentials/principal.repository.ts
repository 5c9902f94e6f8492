/**
 * Principal directory port
 */

import { Principal } from '@tollgate/common/types';

export abstract class PrincipalRepository {
  /**
   * Look up by email when the identifier contains `@`, by tax id otherwise
   */
  abstract findByIdentifier(identifier: string): Promise<Principal | null>;

  abstract findById(id: string): Promise<Principal | null>;
}
