import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { JwtModule } from "@nestjs/jwt";
import { AuthService } from "./auth.service";
import { AuthGuard } from "./auth.guard";
import { AdminGuard } from "./admin.guard";
import { DEFAULT_TOKEN_TTL_SECONDS } from "./auth.constants";

@Module({
	imports: [
		JwtModule.registerAsync({
			inject: [ConfigService],
			useFactory: (cfg: ConfigService) => {
				const secret = cfg.get<string>("JWT_SECRET");
				if (!secret) {
					throw new Error("JWT_SECRET is not set");
				}
				return {
					secret,
					signOptions: {
						expiresIn: Number(
							cfg.get<string>("JWT_TTL_SECONDS") ?? DEFAULT_TOKEN_TTL_SECONDS,
						),
					},
				};
			},
		}),
	],
	providers: [AuthService, AuthGuard, AdminGuard],
	exports: [AuthService, AuthGuard, AdminGuard],
})
export class AuthModule {}
