/**
 * Error taxonomy for the renderer.
 *
 * ConfigError is fatal to a render call. DataShapeError and ResourceDegraded
 * describe problems confined to one visual element; they are logged and
 * returned as diagnostics, never thrown out of a render.
 */

export class ConfigError extends Error {
  constructor(
    message: string,
    public code: string = 'INVALID_CONFIG',
    public path?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class DataShapeError extends Error {
  constructor(
    message: string,
    public eventTitle: string,
    public sourceCalendarId: string,
  ) {
    super(message);
    this.name = 'DataShapeError';
  }
}

/** A preferred resource was unavailable and a fallback was used instead. */
export interface ResourceDegraded {
  kind: 'resource_degraded';
  resource: 'font' | 'weather_icon';
  name: string;
  reason: string;
}

export type RenderDiagnostic = ResourceDegraded | DataShapeError;

export function resourceDegraded(resource: ResourceDegraded['resource'], name: string, reason: string): ResourceDegraded {
  return { kind: 'resource_degraded', resource, name, reason };
}
