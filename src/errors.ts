export class ConfigurationError extends Error {
  readonly code = "configuration_invalid";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class FleetRequestError extends Error {
  readonly code = "fleet_request_failed";

  constructor(
    message: string,
    readonly statusCode: number | null = null
  ) {
    super(message);
    this.name = "FleetRequestError";
  }
}
