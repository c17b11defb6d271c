import { Test, TestingModule } from '@nestjs/testing';

import { AppModule } from './app.module';
import { SERVER_CONFIG, ServerConfig } from './config/server.config';
import { CardService } from './game/card.service';
import { LobbyService } from './lobby/lobby.service';
import { RANDOM_SOURCE, RandomSource } from './utils/random';
import { testConfig } from './testing/fixtures';

describe('AppModule', () => {
  let moduleRef: TestingModule;

  afterEach(async () => {
    await moduleRef.close();
  });

  it('wires the bundled config and card collection', async () => {
    moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(SERVER_CONFIG)
      .useValue(testConfig())
      .compile();

    expect(moduleRef.get<ServerConfig>(SERVER_CONFIG).presetNames()).toContain('sparse');
    expect(moduleRef.get(CardService).getCards('Leader')).toHaveLength(6);

    const { room } = moduleRef.get(LobbyService).createRoom({ sessionId: 's-ada', playerName: 'Ada' });
    expect(room.getActivePlayerCount()).toBe(1);
  });

  it('seeds the random source from the config', async () => {
    moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(SERVER_CONFIG)
      .useValue(testConfig({ randomSeed: 'test-seed' }))
      .compile();
    const first = moduleRef.get<RandomSource>(RANDOM_SOURCE)();
    await moduleRef.close();

    moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(SERVER_CONFIG)
      .useValue(testConfig({ randomSeed: 'test-seed' }))
      .compile();
    expect(moduleRef.get<RandomSource>(RANDOM_SOURCE)()).toBe(first);
  });
});
