/**
 * Store-wide defaults applied to new read builders.
 */
export type KvFormatDefaults = {
  /** Seconds; overridden per call with `cacheTtl()`. */
  cacheTtl?: number
}
