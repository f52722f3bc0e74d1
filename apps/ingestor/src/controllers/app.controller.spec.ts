import { Test, TestingModule } from '@nestjs/testing';
import { IngestionService } from '../services/ingestion.service';
import { AppController } from './app.controller';

describe('AppController', () => {
  let controller: AppController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        {
          provide: IngestionService,
          useValue: { getSources: jest.fn().mockReturnValue(['CoinPaprika', 'CoinGecko']) },
        },
      ],
    }).compile();

    controller = module.get<AppController>(AppController);
  });

  it('should describe the service', () => {
    expect(controller.getInfo()).toEqual({
      service: 'price-ingestion-service',
      sources: ['CoinPaprika', 'CoinGecko'],
      docs: ['/data', '/stats', '/runs', '/compare-runs', '/health', '/metrics'],
    });
  });
});
