import { ServerUnaryCall, ServerWritableStream, sendUnaryData } from '@grpc/grpc-js';

export type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

export interface HealthCheckRequest {
    service: string;
}

export interface HealthCheckResponse {
    status: ServingStatus;
}

/** A dependency check; resolving means healthy. */
export type HealthProbe = () => Promise<unknown>;

/**
 * Standard gRPC health check service.
 * SERVING only while every probe (Postgres, Redis, ...) resolves.
 */
export class HealthService {
    constructor(private readonly probes: HealthProbe[] = []) { }

    async status(): Promise<ServingStatus> {
        try {
            await Promise.all(this.probes.map((probe) => probe()));
            return 'SERVING';
        } catch (error) {
            console.error('[health] check failed:', error);
            return 'NOT_SERVING';
        }
    }

    async check(
        _call: ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>,
        callback: sendUnaryData<HealthCheckResponse>,
    ): Promise<void> {
        callback(null, { status: await this.status() });
    }

    async watch(call: ServerWritableStream<HealthCheckRequest, HealthCheckResponse>): Promise<void> {
        call.write({ status: await this.status() });
        call.end();
    }
}
