export { default as historyRoutes } from './history-routes.js';
