import { z } from 'zod';
import type { ContainerEvent } from '@hostwatch/shared';
import type { Frame } from './FrameDecoder.js';

const dockerEventSchema = z.object({
  Actor: z
    .object({
      Attributes: z.record(z.unknown()).optional(),
    })
    .optional(),
});

function attributeString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

/**
 * Extract the container name and exit code from a runtime event frame.
 * A missing exit code counts as a clean exit ("0").
 */
export function toContainerEvent(frame: Frame): ContainerEvent {
  const parsed = dockerEventSchema.safeParse(frame);
  const attributes = (parsed.success ? parsed.data.Actor?.Attributes : undefined) ?? {};

  const exitCode = attributeString(attributes.exitCode) ?? '0';

  return {
    containerName: attributeString(attributes.name) || 'Unknown',
    exitCode,
    isAbnormal: exitCode !== '0',
  };
}

export function formatCrashMessage(event: ContainerEvent): string {
  return `Container '${event.containerName}' crashed (Exit Code: ${event.exitCode})`;
}
