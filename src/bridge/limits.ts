import { DEFAULT_TYPE_MAX_SIZE } from '../utils/ServiceType'
import { DEFAULT_MAX_BROWSE_SESSIONS } from './SessionRegistry'

// MARK: BridgeLimits
/**
 * Fixed sizes records are checked against.
 */
export interface BridgeLimits {
  /**
   * Longest instance name accepted in a result: two 16-digit hex identifiers and a dash.
   * @default 33
   */
  instanceNameMaxLength: number
  /**
   * Longest base type (protocol suffix excluded).
   * @default 32
   */
  typeMaxSize: number
  /**
   * Longest wire type accepted in a resolve result.
   * @default 41
   */
  typeAndProtocolMaxSize: number
  /**
   * Host names longer than this are cut when copied into a record.
   * @default 16
   */
  hostNameMaxLength: number
  /**
   * Browse sessions that may run at once.
   * @default 1024
   */
  maxBrowseSessions: number
  /**
   * Largest count a published TXT list, subtype list or TXT value may have.
   * @default 0xffffffff
   */
  maxPublishCount: number
}

const PROTOCOL_TEXT_MAX_SIZE = 8

export const DEFAULT_LIMITS: Readonly<BridgeLimits> = {
  instanceNameMaxLength: 33,
  typeMaxSize: DEFAULT_TYPE_MAX_SIZE,
  typeAndProtocolMaxSize: DEFAULT_TYPE_MAX_SIZE + PROTOCOL_TEXT_MAX_SIZE + 1,
  hostNameMaxLength: 16,
  maxBrowseSessions: DEFAULT_MAX_BROWSE_SESSIONS,
  maxPublishCount: 0xffffffff,
}
