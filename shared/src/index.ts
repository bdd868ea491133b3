// Core types and enums for the mining-project geolocation pipeline
export * from './enums.js';
export * from './mentions.js';
export * from './projects.js';
export * from './geo.js';
export * from './output.js';
export * from './api.js';
