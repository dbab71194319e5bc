import { Injectable, Logger, UnauthorizedException } from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import type { Principal } from "@pledgebook/sdk";
import type { AccessTokenPayload } from "./auth.constants";

/**
 * Issues and checks the bearer tokens that identify callers. The token's
 * `sub` claim is the caller's principal.
 */
@Injectable()
export class AuthService {
	private readonly logger = new Logger(AuthService.name);

	constructor(private readonly jwt: JwtService) {}

	async signToken(principal: Principal): Promise<string> {
		return this.jwt.signAsync({ sub: principal } satisfies AccessTokenPayload);
	}

	async verifyToken(token: string): Promise<Principal> {
		let payload: { sub?: unknown };
		try {
			payload = await this.jwt.verifyAsync<{ sub?: unknown }>(token);
		} catch (e) {
			this.logger.warn(`Invalid token: ${e instanceof Error ? e.message : String(e)}`);
			throw new UnauthorizedException("Invalid token");
		}
		if (typeof payload.sub !== "string" || payload.sub.length === 0) {
			throw new UnauthorizedException("Token has no subject");
		}
		return payload.sub;
	}
}
