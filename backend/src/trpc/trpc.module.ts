import { Module } from "@nestjs/common";

import { TrpcRouter } from "./trpc.router";
import { TariffServicesModule } from "../tariff-services.module";

@Module({
  imports: [TariffServicesModule],
  providers: [TrpcRouter],
  exports: [TrpcRouter],
})
export class TrpcModule {
}
