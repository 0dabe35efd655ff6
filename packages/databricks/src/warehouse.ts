import { ConfigurationError } from '@tableshift/core';

const WAREHOUSE_PATH = /^\/?sql\/(?:1\.0|protocolv1)\/(?:warehouses|endpoints)\/([A-Za-z0-9]+)\/?$/;

/** Extract the SQL warehouse id from a connection HTTP path such as `/sql/1.0/warehouses/abc123`. */
export function warehouseIdFromHttpPath(httpPath: string): string {
  const match = WAREHOUSE_PATH.exec(httpPath.trim());
  if (!match?.[1]) {
    throw new ConfigurationError(
      `Cannot derive a SQL warehouse id from HTTP path '${httpPath}'. Expected /sql/1.0/warehouses/<id>.`,
    );
  }
  return match[1];
}
