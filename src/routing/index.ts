export { routeRecipients, routeAll, knownCategories, dedupeAddresses } from './recipient-router.js';
