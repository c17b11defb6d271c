import { Module } from '@nestjs/common';

import { SERVER_CONFIG, ServerConfig, loadServerConfig } from './config/server.config';
import { CARD_POOL, CardService, loadCardPool } from './game/card.service';
import { CountdownService } from './game/countdown.service';
import { RoleConfigService } from './game/role-config.service';
import { RolesService } from './game/roles.service';
import { LobbyGateway } from './gateway/lobby.gateway';
import { LobbyService } from './lobby/lobby.service';
import { RoomManager } from './room/room.manager';
import { RANDOM_SOURCE, defaultRandom, seededRandom } from './utils/random';

@Module({
  providers: [
    { provide: SERVER_CONFIG, useFactory: () => loadServerConfig() },
    {
      provide: RANDOM_SOURCE,
      useFactory: (config: ServerConfig) =>
        config.server.randomSeed ? seededRandom(config.server.randomSeed) : defaultRandom,
      inject: [SERVER_CONFIG],
    },
    {
      provide: CARD_POOL,
      useFactory: (config: ServerConfig) => loadCardPool(config.server.cardsPath),
      inject: [SERVER_CONFIG],
    },
    CardService,
    RoleConfigService,
    RolesService,
    RoomManager,
    CountdownService,
    LobbyService,
    LobbyGateway,
  ],
})
export class AppModule {}
