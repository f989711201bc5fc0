// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/metric.js';
export * from './entities/reading.js';
export * from './entities/vehicle-state.js';
export * from './entities/alert.js';
export * from './entities/dashboard-frame.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/telemetry-ingestion.port.js';
export * from './ports/inbound/dashboard-query.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/telemetry-source.port.js';
export * from './ports/outbound/display-surface.port.js';
export * from './ports/outbound/reading-archive.port.js';
export * from './ports/outbound/clock.port.js';
export * from './ports/outbound/logger.port.js';
