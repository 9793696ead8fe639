import { Module } from "@nestjs/common";

import { ConfigFileService } from "./config/config-file.service";
import { RuntimeConfigService } from "./config/runtime-config.service";
import { SOURCE_SETTINGS, SourceSettingsFactory } from "./config/source-settings.factory";
import { EndpointCheckService } from "./forecast/endpoint-check.service";
import { ForecastClient } from "./forecast/forecast.client";
import { ForecastRefreshService } from "./forecast/forecast-refresh.service";
import { RefreshSchedulerService } from "./forecast/refresh-scheduler.service";
import { SnapshotStoreService } from "./forecast/snapshot-store.service";
import { cancellableWait, RETRY_WAIT } from "./forecast/wait";
import { PriceStateService } from "./price/price-state.service";
import { StorageModule } from "./storage/storage.module";

@Module({
  imports: [StorageModule],
  providers: [
    ConfigFileService,
    RuntimeConfigService,
    SourceSettingsFactory,
    {
      provide: SOURCE_SETTINGS,
      inject: [RuntimeConfigService, SourceSettingsFactory],
      useFactory: (runtimeConfig: RuntimeConfigService, factory: SourceSettingsFactory) =>
        factory.create(runtimeConfig.getDocumentRef()),
    },
    {provide: RETRY_WAIT, useValue: cancellableWait},
    ForecastClient,
    ForecastRefreshService,
    SnapshotStoreService,
    RefreshSchedulerService,
    EndpointCheckService,
    PriceStateService,
  ],
  exports: [
    ConfigFileService,
    RuntimeConfigService,
    SOURCE_SETTINGS,
    ForecastClient,
    SnapshotStoreService,
    RefreshSchedulerService,
    EndpointCheckService,
    PriceStateService,
  ],
})
export class TariffServicesModule {}
