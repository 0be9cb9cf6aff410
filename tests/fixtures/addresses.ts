// Test Fixtures - Addresses
export const ADMIN_ADDRESS = "0xad00000000000000000000000000000000000001";
export const PAYOUT_ADDRESS = "0xfee0000000000000000000000000000000000002";
export const BUYER_ADDRESS = "0xb000000000000000000000000000000000000003";
export const RECIPIENT_ADDRESS = "0xc000000000000000000000000000000000000004";
export const OTHER_ADDRESS = "0xd000000000000000000000000000000000000005";
export const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000";

export const ADMIN_API_KEY = "test-admin-key-0000";
