/**
 * Channel statistics types.
 */

/**
 * Queue depth of a single channel.
 */
export interface ChannelStats {
  /** Messages published but not yet delivered. */
  ready: number;
  /** Messages delivered but not yet acknowledged. */
  unacked: number;
  /** ready + unacked. */
  total: number;
}

/**
 * Stats for several channels, keyed by channel name.
 */
export type ChannelStatsMap = Record<string, ChannelStats>;
