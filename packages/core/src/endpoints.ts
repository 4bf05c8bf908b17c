// @outline-admin/core - Management API endpoint table

import type { EndpointTemplate, HttpVerb } from './types.js';

export const UrlParams = {
  KeyId: 'keyId',
} as const;

export interface EndpointDefinition {
  verb: HttpVerb;
  template: EndpointTemplate;
  /** The single status code that counts as success */
  expectedStatus: number;
}

export const Endpoints = {
  listAccessKeys: { verb: 'GET', template: '/access-keys', expectedStatus: 200 },
  getAccessKey: { verb: 'GET', template: `/access-keys/{${UrlParams.KeyId}}`, expectedStatus: 200 },
  createAccessKey: { verb: 'POST', template: '/access-keys', expectedStatus: 201 },
  updateAccessKey: { verb: 'PUT', template: `/access-keys/{${UrlParams.KeyId}}`, expectedStatus: 201 },
  deleteAccessKey: { verb: 'DELETE', template: `/access-keys/{${UrlParams.KeyId}}`, expectedStatus: 204 },
} as const satisfies Record<string, EndpointDefinition>;

export type OperationName = keyof typeof Endpoints;
