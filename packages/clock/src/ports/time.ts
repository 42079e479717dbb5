/** Milliseconds since the Unix epoch, or a duration in milliseconds. */
export type Milliseconds = number
