import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import type { LoanStatus } from "@pledgebook/sdk";

@Entity("loans")
export class LoanEntity {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index()
	@Column({ type: "text" })
	borrower!: string;

	@Column({ type: "integer" })
	amount!: number;

	// percent
	@Column({ type: "integer" })
	interestRate!: number;

	@Column({ type: "integer" })
	durationMs!: number;

	@Index()
	@Column({ type: "text" })
	collateralAsset!: string;

	@Column({ type: "text" })
	collateralTokenId!: string;

	// Unix ms
	@Column({ type: "integer" })
	issuedAt!: number;

	@Column({ type: "integer", nullable: true })
	approvedAt!: number | null;

	@Index()
	@Column({ type: "text", default: "requested" })
	status!: LoanStatus;

	// repaidAt or defaultedAt, depending on status
	@Column({ type: "integer", nullable: true })
	settledAt!: number | null;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
