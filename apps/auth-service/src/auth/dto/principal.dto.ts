import { PrincipalSummary } from '@tollgate/common/types';

export class PrincipalDto {
  principal_id!: string;
  email!: string | null;
  tax_id!: string | null;
  display_name!: string | null;
}

export class MeResponseDto extends PrincipalDto {
  expires_at!: string; // access token expiry, ISO 8601
}

export function toPrincipalDto(summary: PrincipalSummary): PrincipalDto {
  return {
    principal_id: summary.id,
    email: summary.email,
    tax_id: summary.taxId,
    display_name: summary.displayName,
  };
}
