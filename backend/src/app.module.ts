import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { StorageModule } from "./storage/storage.module";
import { TariffServicesModule } from "./tariff-services.module";
import { TrpcModule } from "./trpc/trpc.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env", "../.env", "../../.env"],
      cache: true,
    }),
    StorageModule,
    TariffServicesModule,
    TrpcModule,
  ],
})
export class AppModule {
}
