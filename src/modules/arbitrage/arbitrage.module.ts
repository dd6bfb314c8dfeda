import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BookmakerOddsQuote } from './entities/bookmaker-odds-quote.entity';
import { ArbitrageOpportunity } from './entities/arbitrage-opportunity.entity';
import { ArbitrageScannerService } from './services/arbitrage-scanner.service';
import { ArbitrageController } from './controllers/arbitrage.controller';

@Module({
  imports: [TypeOrmModule.forFeature([BookmakerOddsQuote, ArbitrageOpportunity])],
  controllers: [ArbitrageController],
  providers: [ArbitrageScannerService],
  exports: [ArbitrageScannerService],
})
export class ArbitrageModule {}
