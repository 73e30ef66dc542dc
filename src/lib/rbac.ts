/**
 * RBAC reference helpers
 * 以 rbac reporter 建立 inventory 的資源與 subject 參照
 */

import type { RepresentationType, ResourceReference, SubjectReference } from '../types/inventory.js';

export const RBAC_REPORTER = 'rbac';

export function workspaceType(): RepresentationType {
  return { resourceType: 'workspace', reporterType: RBAC_REPORTER };
}

export function roleType(): RepresentationType {
  return { resourceType: 'role', reporterType: RBAC_REPORTER };
}

/**
 * resourceId 為 `<domain>/<id>`
 */
export function principalResource(id: string, domain: string): ResourceReference {
  return {
    resourceType: 'principal',
    resourceId: `${domain}/${id}`,
    reporter: { type: RBAC_REPORTER },
  };
}

export function roleResource(resourceId: string): ResourceReference {
  return {
    resourceType: 'role',
    resourceId,
    reporter: { type: RBAC_REPORTER },
  };
}

export function workspaceResource(resourceId: string): ResourceReference {
  return {
    resourceType: 'workspace',
    resourceId,
    reporter: { type: RBAC_REPORTER },
  };
}

export function principalSubject(id: string, domain: string): SubjectReference {
  return { resource: principalResource(id, domain) };
}

/**
 * 空字串的 relation 不放入參照
 */
export function subject(resource: ResourceReference, relation?: string): SubjectReference {
  return relation ? { resource, relation } : { resource };
}

/**
 * 解析 `<resourceType>:<resourceId>`，例如 `principal:redhat/alice`
 */
export function parseResourceRef(value: string, reporterType: string = RBAC_REPORTER): ResourceReference {
  const separator = value.indexOf(':');
  if (separator <= 0 || separator === value.length - 1) {
    throw new Error(`Invalid resource reference "${value}": expected <type>:<id>`);
  }

  return {
    resourceType: value.slice(0, separator),
    resourceId: value.slice(separator + 1),
    reporter: { type: reporterType },
  };
}
