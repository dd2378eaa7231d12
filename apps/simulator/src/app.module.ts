import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { validateEnv } from "./config/env.validation";
import { SIMULATION_CONFIG, simulationConfigProvider } from "./config/simulation.config";
import type { SimulationConfig } from "./config/simulation.config";
import { CHAT_COMPLETION_CLIENT, chatCompletionClientFactory } from "./services/llm-client";
import { MarketDataService } from "./services/market-data.service";
import { NewsService } from "./services/news.service";
import { RecommenderService } from "./services/recommender.service";
import { SimulationService } from "./services/simulation.service";
import { TradingService } from "./services/trading.service";
import { NEWS_SOURCE, PRICE_SOURCE, RECOMMENDER } from "./tokens";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env.local", ".env"],
      validate: validateEnv,
    }),
  ],
  providers: [
    simulationConfigProvider,
    {
      provide: CHAT_COMPLETION_CLIENT,
      inject: [SIMULATION_CONFIG],
      useFactory: (config: SimulationConfig) => chatCompletionClientFactory(config),
    },
    MarketDataService,
    NewsService,
    RecommenderService,
    TradingService,
    SimulationService,
    { provide: PRICE_SOURCE, useExisting: MarketDataService },
    { provide: NEWS_SOURCE, useExisting: NewsService },
    { provide: RECOMMENDER, useExisting: RecommenderService },
  ],
})
export class AppModule {}
