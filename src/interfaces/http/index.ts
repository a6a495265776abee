export { default as sessionRoutes } from './session-routes.js';
export { default as raceRoutes } from './race-routes.js';
export { default as healthRoutes } from './health-routes.js';
