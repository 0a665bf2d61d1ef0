/**
 * portmemo — Shared tuple-key parameters for MCP tools
 */

import { z } from 'zod';
import type { PortKey } from '../../types/entities.js';
import { PortNumberSchema, ProtocolSchema } from '../../types/port.js';

export const keyParams = {
  hostId: z.string().min(1).optional().describe('Host identifier (defaults to the monitored host)'),
  protocol: ProtocolSchema.describe('tcp or udp'),
  port: PortNumberSchema.describe('Port number (1-65535)'),
};

export function toKey(
  defaultHostId: string,
  args: { hostId?: string; protocol: PortKey['protocol']; port: number },
): PortKey {
  return { hostId: args.hostId ?? defaultHostId, protocol: args.protocol, port: args.port };
}
