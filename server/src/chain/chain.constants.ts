export const FUNGIBLE_TOKEN = "FUNGIBLE_TOKEN";
export const NFT_ASSETS = "NFT_ASSETS";
export const SCORE_ORACLE = "SCORE_ORACLE";

export const DEFAULT_RESERVE_PRINCIPAL = "reserve";
export const DEFAULT_VAULT_PRINCIPAL = "vault";
