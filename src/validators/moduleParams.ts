import { z } from 'zod';
import { ValidationError } from '../errors';

const optionalText = z.string().trim().optional();
const numericText = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

/**
 * Login parameters shared by every module
 * Unset values fall back to MONITORING_* configuration
 */
const loginParamsShape = {
  login_user: optionalText,
  login_password: z.string().optional(),
  login_url: optionalText,
};

export const hostGroupParamsSchema = z
  .object({
    ...loginParamsShape,
    name: z.string().trim().min(1, 'name is required'),
    state: z.enum(['present', 'absent']).default('present'),
  })
  .strict();

export const templateParamsSchema = z
  .object({
    ...loginParamsShape,
    name: z.string().trim().min(1, 'name is required'),
    json: z.string().default(''),
    state: z.enum(['present', 'absent', 'dump']).default('present'),
  })
  .strict();

export const hostParamsSchema = z
  .object({
    ...loginParamsShape,
    name: optionalText,
    host: optionalText,
    visible: optionalText,
    groups: z.string().default(''),
    templates: z.string().default(''),
    status: z.enum(['monitored', 'unmonitored', 'yes', 'no']).default('monitored'),
    dns: optionalText,
    ip: optionalText,
    port: numericText.optional(),
    main: numericText.default('1'),
    type: z.enum(['agent', 'SNMP', 'IPMI', 'JMX']).default('agent'),
    state: z.enum(['present', 'absent']).default('present'),
  })
  .strict()
  .transform(({ name, host, ...rest }, ctx) => {
    // `host` is accepted as an alias of `name`
    const hostName = name || host;
    if (!hostName) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'name (or host) is required',
        path: ['name'],
      });
      return z.NEVER;
    }
    if (rest.dns && rest.ip) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'dns and ip are mutually exclusive',
        path: ['ip'],
      });
      return z.NEVER;
    }
    return { ...rest, name: hostName };
  });

export type HostGroupParams = z.output<typeof hostGroupParamsSchema>;
export type TemplateParams = z.output<typeof templateParamsSchema>;
export type HostParams = z.output<typeof hostParamsSchema>;

export function parseModuleParams<T extends z.ZodTypeAny>(
  moduleName: string,
  schema: T,
  raw: unknown
): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid ${moduleName} parameters: ${issues}`);
  }
  return result.data;
}
