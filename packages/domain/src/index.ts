// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/vehicle.js';
export * from './entities/depreciation-schedule.js';
export * from './entities/adjustment-rule.js';
export * from './entities/valuation-result.js';
export * from './entities/cache-record.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/valuation-usecase.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/valuation-cache.port.js';
export * from './ports/outbound/rc-lookup.port.js';
export * from './ports/outbound/price-discovery.port.js';
export * from './ports/outbound/clock.port.js';
