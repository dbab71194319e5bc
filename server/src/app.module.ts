import { ConfigModule } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
} from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { AuthModule } from "./auth/auth.module";
import { HealthModule } from "./health/health.module";
import { LoansModule } from "./loans/loans.module";
import { UsersModule } from "./users/users.module";
import { AdminModule } from "./admin/admin.module";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";

const isTest = process.env.NODE_ENV === "test";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true }),
		TypeOrmModule.forRootAsync({
			useFactory: () => ({
				type: "better-sqlite3",
				// Chain state is in-process, so loans are not kept across restarts
				// unless a database file is named
				database: isTest
					? ":memory:"
					: process.env.SQLITE_DB_PATH || ":memory:",
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		AuthModule,
		LoansModule,
		UsersModule,
		HealthModule,
		AdminModule,
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(RequestLoggingMiddleware)
			.exclude({ path: "api/v1/health", method: RequestMethod.ALL })
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}
