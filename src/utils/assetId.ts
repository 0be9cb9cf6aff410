// Upper bound of the INTEGER id columns in db/schema.sql
export const MAX_ASSET_ID = 2_147_483_647;

export function isAssetId(id: number): boolean {
  return Number.isInteger(id) && id > 0 && id <= MAX_ASSET_ID;
}
