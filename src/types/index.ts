/**
 * Main types export file for the Plant Growth Analyzer
 */

// Core types
export * from './core';

// Sensor data types
export * from './sensor-data';

// Plant profile types
export * from './plant-profile';

// Analysis result types
export * from './analysis';
