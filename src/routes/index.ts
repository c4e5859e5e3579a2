export { createLinkStatisticsRouter } from './link-statistics-routes';
