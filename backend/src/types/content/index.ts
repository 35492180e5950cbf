/**
 * Content Promotion Type Definitions
 *
 * Central export point for all promotion-related types
 */

export * from './json';
export * from './enums';
export * from './core';
export * from './api';
export * from './errors';
