import { Column, Entity, PrimaryColumn } from 'typeorm';

@Entity('geocode_cache')
export class GeocodeCacheEntry {
	/** The trimmed address text; no other normalization is applied. */
	@PrimaryColumn({ type: 'varchar', length: 1000 })
	addressKey!: string;

	@Column({ type: 'real' })
	latitude!: number;

	@Column({ type: 'real' })
	longitude!: number;

	@Column({ type: 'varchar', length: 64 })
	providerId!: string;

	@Column({ type: 'datetime' })
	createdAt!: Date;
}
