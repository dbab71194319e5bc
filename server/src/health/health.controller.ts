import { Controller, Get, Logger } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { ConfigService } from "@nestjs/config";
import { DataSource } from "typeorm";

export type HealthReport = {
	status: "ok" | "degraded";
	database: "up" | "down";
	timestamp: string;
	uptime: number;
	environment: string;
};

@ApiTags("Health")
@Controller("api/v1/health")
export class HealthController {
	private readonly logger = new Logger(HealthController.name);

	constructor(
		private readonly configService: ConfigService,
		private readonly dataSource: DataSource,
	) {}

	@Get()
	@ApiOperation({ summary: "Health check endpoint" })
	@ApiResponse({
		status: 200,
		description: "Application is up; `database` tells whether the ledger is reachable",
		schema: {
			type: "object",
			properties: {
				status: { type: "string", enum: ["ok", "degraded"] },
				database: { type: "string", enum: ["up", "down"] },
				timestamp: { type: "string", example: "2025-08-26T10:00:00.000Z" },
				uptime: { type: "number", example: 12345 },
				environment: { type: "string", example: "production" },
			},
		},
	})
	async healthCheck(): Promise<HealthReport> {
		const database = await this.probeDatabase();
		return {
			status: database === "up" ? "ok" : "degraded",
			database,
			timestamp: new Date().toISOString(),
			uptime: process.uptime(),
			environment: this.configService.get<string>("NODE_ENV", "development"),
		};
	}

	private async probeDatabase(): Promise<"up" | "down"> {
		try {
			await this.dataSource.query("SELECT 1");
			return "up";
		} catch (e) {
			this.logger.warn(
				`Database probe failed: ${e instanceof Error ? e.message : String(e)}`,
			);
			return "down";
		}
	}
}
