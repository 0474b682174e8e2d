import { IsBase64, IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export const RECOVERY_EXPORT_VERSION = 1;

/**
 * Offline backup of the recovery record. All byte fields are base64.
 * The passphrase is still needed to open it.
 */
export class RecoveryKeyExportDto {
  @IsIn([RECOVERY_EXPORT_VERSION])
  version!: number;

  @IsString()
  @IsNotEmpty()
  @IsBase64()
  encrypted_umk!: string;

  @IsString()
  @IsNotEmpty()
  @IsBase64()
  nonce!: string;

  @IsString()
  @IsNotEmpty()
  @IsBase64()
  salt!: string;

  @IsOptional()
  @IsString()
  created_at?: string;

  @IsOptional()
  @IsIn(['pbkdf2', 'argon2id'])
  kdf_algorithm?: string;
}
