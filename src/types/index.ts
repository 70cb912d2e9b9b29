/**
 * Social Graph Type Definitions
 *
 * Central export point for node, edge and raw entity types.
 */

// Node types
export * from './nodes';

// Edge types
export * from './edges';

// Raw input records
export * from './entities';
