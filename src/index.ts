/**
 * stream-watch
 *
 * Adaptive liveness polling for live-stream channels: decides when each
 * channel is probed, bounds concurrent probes per platform, learns each
 * channel's on-air pattern and drives recording sessions through the
 * collaborator interfaces in `types/collaborators`.
 */

export * from './core/channel-state.js';
export * from './core/channel-registry.js';
export * from './core/channel-persistence.js';
export * from './core/disk-space-gate.js';
export * from './core/live-check-dispatcher.js';
export * from './core/live-likelihood-predictor.js';
export * from './core/live-monitor.js';
export * from './core/live-notifications.js';
export * from './core/live-prober.js';
export * from './core/priority-lane-workers.js';
export * from './core/recording-sessions.js';
export * from './core/schedule-window.js';
export * from './types/channel.js';
export * from './types/collaborators.js';
export * from './utils/index.js';
