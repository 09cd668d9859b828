/**
 * @micro-recall/shared
 *
 * The pure scheduling core: review state, scheduler, session builder and
 * the study session state machine. No I/O and no clock.
 */

export * from './errors';
export * from './scheduler';
export * from './session';
