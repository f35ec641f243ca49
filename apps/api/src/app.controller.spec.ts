// apps/api/src/app.controller.spec.ts
import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';
import { AppService } from './app.service';

describe('AppController (unit)', () => {
  let controller: AppController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [AppService],
    }).compile();

    controller = module.get<AppController>(AppController);
  });

  it('GET /api/v1 -> service metadata', () => {
    expect(controller.root()).toEqual({
      service: 'campus-preorder-api',
      version: 'api/v1',
    });
  });

  it('GET /api/v1/health -> status payload', () => {
    jest.useFakeTimers().setSystemTime(new Date('2030-01-01T00:00:00.000Z'));
    try {
      expect(controller.health()).toEqual({
        status: 'ok',
        timestamp: '2030-01-01T00:00:00.000Z',
      });
    } finally {
      jest.useRealTimers();
    }
  });
});
