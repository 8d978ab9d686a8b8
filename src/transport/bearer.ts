/**
 * Bearer port: the point-to-point link the command channel rides on.
 *
 * A bearer exposes one outbound and one inbound path per {@link Domain}.
 * Connection setup, discovery and characteristic plumbing live behind it.
 */

import type { Domain } from '../models/enums';

export type Unsubscribe = () => void;

export type NotifyListener = (domain: Domain, frame: Uint8Array) => void;

export type DisconnectListener = () => void;

export interface Bearer {
  /**
   * Send one frame on the domain's outbound path.
   */
  write(domain: Domain, frame: Uint8Array): Promise<void>;

  /**
   * Subscribe to inbound frames from both domains.
   */
  onNotify(listener: NotifyListener): Unsubscribe;

  /**
   * Subscribe to link loss.
   */
  onDisconnect(listener: DisconnectListener): Unsubscribe;
}
