/**
 * Proto definitions
 * 執行期載入 inventory_service.proto，不產生程式碼
 */

import * as protoLoader from '@grpc/proto-loader';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { clientCreationError } from './errors.js';

// src/lib 與 dist/lib 皆往上兩層
const PROTO_ROOT = path.join(path.dirname(fileURLToPath(import.meta.url)), '../../proto');

export const INVENTORY_PROTO_FILE = 'kessel/inventory/v1beta2/inventory_service.proto';
export const INVENTORY_SERVICE_NAME = 'kessel.inventory.v1beta2.KesselInventoryService';

export type InventoryMethodName =
  | 'Check'
  | 'CheckForUpdate'
  | 'CheckBulk'
  | 'DeleteResource'
  | 'StreamedListObjects';

export type ServiceMethod = protoLoader.MethodDefinition<object, object>;

let inventoryDefinition: protoLoader.PackageDefinition | null = null;

export function loadInventoryDefinition(): protoLoader.PackageDefinition {
  if (!inventoryDefinition) {
    inventoryDefinition = protoLoader.loadSync(INVENTORY_PROTO_FILE, {
      includeDirs: [PROTO_ROOT],
      keepCase: false,
      longs: String,
      enums: String,
      defaults: true,
      oneofs: true,
    });
  }
  return inventoryDefinition;
}

export function getServiceMethod(
  definition: protoLoader.PackageDefinition,
  serviceName: string,
  methodName: string
): ServiceMethod {
  const service = definition[serviceName];
  if (!service || 'format' in service) {
    throw clientCreationError(`service ${serviceName} not found in proto definition`);
  }

  const method = service[methodName];
  if (!method) {
    throw clientCreationError(`method ${serviceName}/${methodName} not found in proto definition`);
  }

  return method;
}

export function getInventoryMethod(methodName: InventoryMethodName): ServiceMethod {
  return getServiceMethod(loadInventoryDefinition(), INVENTORY_SERVICE_NAME, methodName);
}
