import {
	CanActivate,
	ExecutionContext,
	Injectable,
	UnauthorizedException,
} from "@nestjs/common";
import { AuthService } from "./auth.service";
import type { AuthenticatedRequest } from "./auth.constants";

@Injectable()
export class AuthGuard implements CanActivate {
	constructor(private readonly auth: AuthService) {}

	async canActivate(context: ExecutionContext): Promise<boolean> {
		const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
		const header = req.header("authorization");
		if (!header || !header.startsWith("Bearer ")) {
			throw new UnauthorizedException("Missing bearer token");
		}
		req.caller = await this.auth.verifyToken(
			header.slice("Bearer ".length).trim(),
		);
		return true;
	}
}
