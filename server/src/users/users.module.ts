import { Module } from "@nestjs/common";

import { AuthModule } from "../auth/auth.module";
import { LoansModule } from "../loans/loans.module";
import { UsersController } from "./users.controller";

@Module({
	imports: [AuthModule, LoansModule],
	controllers: [UsersController],
})
export class UsersModule {}
