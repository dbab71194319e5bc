import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/auth.module";
import { ChainModule } from "../chain/chain.module";
import { LoansModule } from "../loans/loans.module";
import { AdminChainController } from "./admin-chain.controller";
import { AdminController } from "./admin.controller";

@Module({
	imports: [AuthModule, ChainModule, LoansModule],
	controllers: [AdminController, AdminChainController],
})
export class AdminModule {}
