export class CollectorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised by the simplified metrics accessor when a metric does not carry
 * exactly one value.
 */
export class MetricShapeError extends CollectorError {
  constructor(
    readonly metricName: string,
    readonly valueCount: number
  ) {
    super(
      `Metric ${metricName} has ${valueCount} values, but ` +
        `FacebookClient.getMetricsForPost only expects one. ` +
        `Use FacebookClient.getRawMetricsForPost instead.`
    );
  }
}

export class PostTypeError extends CollectorError {
  constructor(
    message: string,
    readonly postId: string
  ) {
    super(`${message} (post '${postId}')`);
  }
}

export class ValidationError extends CollectorError {}

export class UnknownIdentifierError extends CollectorError {
  constructor(readonly identifier: string) {
    super(`No mapping found for identifier '${identifier}'`);
  }
}

export class GraphApiError extends CollectorError {}
