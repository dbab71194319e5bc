import {
	Column,
	CreateDateColumn,
	Entity,
	PrimaryColumn,
	UpdateDateColumn,
} from "typeorm";

@Entity("user_profiles")
export class UserProfileEntity {
	@PrimaryColumn({ type: "text" })
	principal!: string;

	@Column({ type: "boolean", default: false })
	verified!: boolean;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
