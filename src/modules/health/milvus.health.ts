import { Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult, HealthCheckError } from '@nestjs/terminus';
import { errorMessage } from '../../common/errors';
import { MilvusService } from '../milvus/milvus.service';

@Injectable()
export class MilvusHealthIndicator extends HealthIndicator {
    constructor(private readonly milvusService: MilvusService) {
        super();
    }

    async isHealthy(key: string): Promise<HealthIndicatorResult> {
        let health: { isHealthy: boolean; reasons: string[] };
        try {
            health = await this.milvusService.checkHealth();
        } catch (error) {
            throw new HealthCheckError(
                'Milvus health check failed',
                this.getStatus(key, false, { message: errorMessage(error) }),
            );
        }

        if (!health.isHealthy) {
            throw new HealthCheckError(
                'Milvus is not healthy',
                this.getStatus(key, false, { reasons: health.reasons }),
            );
        }
        return this.getStatus(key, true);
    }
}
