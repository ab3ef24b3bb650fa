/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency gets a unique Symbol so tsyringe knows
 * "when someone asks for X, give them Y". Symbols never collide with a stray
 * string of the same name and stay out of JSON output.
 *
 * Grouped by layer so the full dependency list can be scanned at a glance.
 */
export const TOKENS = {
  // Infrastructure
  Knex: Symbol.for('Knex'),
  Logger: Symbol.for('Logger'),

  // Coordinator — the single backing collaborator for every collection operation
  CoordinatorClient: Symbol.for('CoordinatorClient'),

  // Services
  CollectionsService: Symbol.for('CollectionsService'),
} as const;
