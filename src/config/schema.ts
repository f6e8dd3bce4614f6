import { z } from 'zod';

// --- Regex patterns ---

const MAC_REGEX = /^([0-9A-Fa-f]{2}:){5}[0-9A-Fa-f]{2}$/;
const CB_UUID_REGEX =
  /^[0-9A-Fa-f]{8}-[0-9A-Fa-f]{4}-[0-9A-Fa-f]{4}-[0-9A-Fa-f]{4}-[0-9A-Fa-f]{12}$/;

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

const byte = z.number().int().min(0).max(255);

// --- Sub-schemas ---

export const BleSchema = z.object({
  device_address: z
    .string()
    .refine((v) => MAC_REGEX.test(v) || CB_UUID_REGEX.test(v), {
      message: 'Must be a MAC address (XX:XX:XX:XX:XX:XX) or CoreBluetooth UUID',
    })
    .optional()
    .nullable(),
  ble_driver: z.enum(['noble', 'node-ble']).optional().nullable(),
  /** Extra advertised-name patterns, on top of the built-in ring names. */
  name_patterns: z
    .array(
      z.string().min(1).refine(isValidRegex, { message: 'Must be a valid regular expression' }),
    )
    .optional(),
  scan_timeout_ms: z.number().int().min(1000).max(600_000).default(60_000),
});

export const HeaderStyleSchema = z.union([
  z.literal('auto'),
  z.object({ marker: byte }).strict(),
  z.object({ fixed_offset: z.number().int().min(2).max(64) }).strict(),
]);

export const ProtocolSchema = z.object({
  response_timeout_ms: z.number().int().min(100).max(60_000).default(5_000),
  bulk_timeout_ms: z.number().int().min(100).max(300_000).default(10_000),
  final_frame_threshold: z.number().int().min(1).max(512).default(20),
  header_style: HeaderStyleSchema.default('auto'),
  queue_capacity: z.number().int().min(1).max(65_536).default(256),
});

export const RuntimeSchema = z.object({
  debug: z.boolean().default(false),
  allow_partial: z.boolean().default(false),
});

export const AppConfigSchema = z.object({
  version: z.literal(1),
  ble: BleSchema.default({}),
  protocol: ProtocolSchema.default({}),
  runtime: RuntimeSchema.default({}),
});

// --- Inferred types ---

export type BleConfig = z.infer<typeof BleSchema>;
export type HeaderStyleConfig = z.infer<typeof HeaderStyleSchema>;
export type ProtocolConfig = z.infer<typeof ProtocolSchema>;
export type RuntimeConfig = z.infer<typeof RuntimeSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

// --- Error formatting ---

export function formatConfigError(error: z.ZodError, source = 'config.yaml'): string {
  const lines = [`Configuration error in ${source}:`, ''];

  for (const issue of error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    lines.push(`  ${path}`);
    lines.push(`    ${issue.message}`);
    lines.push('');
  }

  lines.push('See config.yaml.example for every supported key.');

  return lines.join('\n');
}
