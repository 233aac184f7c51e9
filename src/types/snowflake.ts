/**
 * Discord Snowflake IDs.
 *
 * Snowflakes are 64-bit unsigned integers, so they travel as decimal strings.
 */

export type Snowflake = string;
