/**
 * CRM Client
 *
 * Thin client over the HubSpot companies and associations API.
 */

export {
  CompaniesClient,
  createCompaniesClient,
  parentNameFor,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUTS,
  COMPANIES_PATH,
  ASSOCIATIONS_PATH,
  PARENT_TO_CHILD_TYPE_ID,
  CHILD_TO_PARENT_TYPE_ID,
  CHILD_LINK_PROPERTY,
  LOCATION_PROPERTY,
  IMPORTED_NAME_PROPERTY,
  UNNAMED_COMPANY,
  PARENT_SUFFIX,
} from './client.js';
export * from './errors.js';
export type * from './types.js';
