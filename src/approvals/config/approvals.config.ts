import { registerAs } from '@nestjs/config';
import { IsBoolean, IsInt, IsNumber, Max, Min } from 'class-validator';
import { ApprovalsConfig } from './approvals-config.type';
import validateConfig from '../../utils/validate-config';

export const DEFAULT_ESCALATION_TIMEOUT_HOURS = 24;
export const DEFAULT_MAX_ESCALATION_DEPTH = 3;

class EnvironmentVariablesValidator {
  @IsNumber()
  @Min(0)
  APPROVALS_DEFAULT_ESCALATION_TIMEOUT_HOURS: number =
    DEFAULT_ESCALATION_TIMEOUT_HOURS;

  @IsInt()
  @Min(0)
  @Max(20)
  APPROVALS_MAX_ESCALATION_DEPTH: number = DEFAULT_MAX_ESCALATION_DEPTH;

  @IsBoolean()
  APPROVALS_ESCALATION_SCAN_ENABLED: boolean = true;
}

export default registerAs<ApprovalsConfig>('approvals', () => {
  const validatedConfig = validateConfig(
    {
      APPROVALS_DEFAULT_ESCALATION_TIMEOUT_HOURS: process.env
        .APPROVALS_DEFAULT_ESCALATION_TIMEOUT_HOURS
        ? parseFloat(process.env.APPROVALS_DEFAULT_ESCALATION_TIMEOUT_HOURS)
        : DEFAULT_ESCALATION_TIMEOUT_HOURS,
      APPROVALS_MAX_ESCALATION_DEPTH: process.env.APPROVALS_MAX_ESCALATION_DEPTH
        ? parseInt(process.env.APPROVALS_MAX_ESCALATION_DEPTH, 10)
        : DEFAULT_MAX_ESCALATION_DEPTH,
      APPROVALS_ESCALATION_SCAN_ENABLED:
        process.env.APPROVALS_ESCALATION_SCAN_ENABLED !== 'false',
    },
    EnvironmentVariablesValidator,
  );

  return {
    defaultEscalationTimeoutHours:
      validatedConfig.APPROVALS_DEFAULT_ESCALATION_TIMEOUT_HOURS,
    maxEscalationDepth: validatedConfig.APPROVALS_MAX_ESCALATION_DEPTH,
    escalationScanEnabled: validatedConfig.APPROVALS_ESCALATION_SCAN_ENABLED,
  };
});
