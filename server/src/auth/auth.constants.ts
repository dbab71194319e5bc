import type { Request } from "express";
import type { Principal } from "@pledgebook/sdk";

export type AccessTokenPayload = {
	sub: Principal;
};

export type AuthenticatedRequest = Request & {
	caller?: Principal;
};

export const DEFAULT_TOKEN_TTL_SECONDS = 3600;
