import {
	CanActivate,
	ExecutionContext,
	ForbiddenException,
	Injectable,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { AuthenticatedRequest } from "./auth.constants";

/**
 * Admits only the administrator. Runs after `AuthGuard`.
 */
@Injectable()
export class AdminGuard implements CanActivate {
	constructor(private readonly config: ConfigService) {}

	canActivate(context: ExecutionContext): boolean {
		const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
		const admin = this.config.get<string>("ADMIN_PRINCIPAL");
		if (!admin || req.caller !== admin) {
			throw new ForbiddenException("Administrator only");
		}
		return true;
	}
}
