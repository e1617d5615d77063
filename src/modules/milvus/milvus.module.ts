import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { MilvusClient } from '@zilliz/milvus2-sdk-node';
import milvusConfig from '../../config/milvus.config';
import { MILVUS_CLIENT } from './milvus.constants';
import { MilvusService } from './milvus.service';

/**
 * Milvus Module - Vector Database Integration
 * One client per process, built from the `milvus` config namespace.
 */
@Module({
    providers: [
        {
            provide: MILVUS_CLIENT,
            inject: [milvusConfig.KEY],
            useFactory: (config: ConfigType<typeof milvusConfig>) =>
                new MilvusClient({
                    address: config.address,
                    token: config.token || undefined,
                    database: config.database,
                    timeout: config.timeout,
                }),
        },
        MilvusService,
    ],
    exports: [MilvusService],
})
export class MilvusModule { }
