// Enrollment Assistant Contracts
// Shared type-level contracts for the backend API and its clients
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only DTOs, event schemas, request/response shapes
// - If something needs logic, it lives in a module, not here

export type * from './events/index.js';
export type * from './api/index.js';
