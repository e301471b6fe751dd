/**
 * Access Notifier Interface
 *
 * Applies a permission level to a member of a chat group.
 *
 * @module packages/core/ports/IAccessNotifier
 */

import type { GateDecision } from '../../../types/index.js';

export interface IAccessNotifier {
  /**
   * @throws NotifierError when the platform rejects the change or cannot be reached
   */
  setPermission(decision: GateDecision): Promise<void>;
}
