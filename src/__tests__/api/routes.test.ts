import request from 'supertest';
import { createApp } from '../../api/server';
import { InvestmentPlanner } from '../../planner/investmentPlanner';
import { InMemorySecuritySource, SecuritySource } from '../../data/securityStore';
import { PriceFeed } from '../../data/priceFeed';
import { Security } from '../../models/Security';
import { oddPricedSecurities, twoSecurities } from '../fixtures/securities';
import { FailingPriceFeed, StaticPriceFeed } from '../fixtures/priceFeeds';

function appWith(securities: Security[], priceFeed?: PriceFeed, refreshPrices = true) {
  return createApp(
    new InvestmentPlanner({ source: new InMemorySecuritySource(securities), priceFeed, refreshPrices })
  );
}

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('GET /api', () => {
  it('should return API information', async () => {
    const response = await request(appWith(twoSecurities)).get('/api');

    expect(response.status).toBe(200);
    expect(response.body.message).toBeDefined();
    expect(response.body.endpoints.calculateInvestment).toBeDefined();
    expect(response.body.endpoints.sip).toBeDefined();
  });
});

describe('GET /', () => {
  it('should redirect to the API information endpoint', async () => {
    const response = await request(appWith(twoSecurities)).get('/');

    expect(response.status).toBe(302);
    expect(response.headers.location).toBe('/api');
  });
});

describe('GET /api/health', () => {
  it('should return status ok with timestamp', async () => {
    const response = await request(appWith(twoSecurities)).get('/api/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
    expect(response.body.timestamp).toBeDefined();
  });
});

describe('GET /api/calculate-investment', () => {
  it('should return the allocation with the price update message', async () => {
    const app = appWith(twoSecurities, new StaticPriceFeed({ A: 10, B: 20 }));
    const response = await request(app)
      .get('/api/calculate-investment')
      .query({ coveragePercent: 50, investmentAmount: 1000 });

    expect(response.status).toBe(200);
    expect(response.body.success).toBe(true);
    expect(response.body.message).toBe(
      'Investment calculation completed successfully | Updated prices for 2/2 companies'
    );
    expect(response.body.selectedCompanies).toEqual(['A']);
    expect(response.body.investmentPlan).toEqual([
      { symbol: 'A', weightPercent: 60, adjustedWeightPercent: 100, price: 10, shares: 100, investedAmount: 1000 },
    ]);
    expect(response.body.summary.remainingCash).toBe(0);
    expect(response.body.warnings).toEqual([]);
  });

  it('should still succeed with a warning when the price feed is down', async () => {
    const app = appWith(twoSecurities, new FailingPriceFeed());
    const response = await request(app)
      .get('/api/calculate-investment')
      .query({ coveragePercent: 100, investmentAmount: 1000 });

    expect(response.status).toBe(200);
    expect(response.body.message).toBe(
      'Investment calculation completed successfully | Price update warning: Error updating prices: Price feed request failed: timeout'
    );
    expect(response.body.summary.totalInvested).toBe(1000);
  });

  it('should support leftover redistribution', async () => {
    const app = appWith(oddPricedSecurities, undefined, false);
    const response = await request(app)
      .get('/api/calculate-investment')
      .query({ coveragePercent: 100, investmentAmount: 1000, redistributeLeftover: 'true' });

    expect(response.status).toBe(200);
    expect(response.body.message).toBe('Investment calculation completed successfully');
    expect(response.body.investmentPlan.map((line: { shares: number }) => line.shares)).toEqual([87, 13]);
  });

  it('should return 400 for missing parameters', async () => {
    const response = await request(appWith(twoSecurities)).get('/api/calculate-investment');

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('MissingRequiredField');
  });

  it('should return 400 for out-of-range parameters', async () => {
    const app = appWith(twoSecurities);
    const lowCoverage = await request(app)
      .get('/api/calculate-investment')
      .query({ coveragePercent: 0, investmentAmount: 5000 });
    const smallAmount = await request(app)
      .get('/api/calculate-investment')
      .query({ coveragePercent: 50, investmentAmount: 500 });

    expect(lowCoverage.status).toBe(400);
    expect(lowCoverage.body.error).toBe('InvalidRange');
    expect(smallAmount.status).toBe(400);
    expect(smallAmount.body.error).toBe('InvalidRange');
  });

  it('should return 422 when selected weights cannot be normalised', async () => {
    const app = appWith([{ symbol: 'Z', weight: 0, price: 10 }], undefined, false);
    const response = await request(app)
      .get('/api/calculate-investment')
      .query({ coveragePercent: 50, investmentAmount: 1000 });

    expect(response.status).toBe(422);
    expect(response.body.error).toBe('ConfigurationError');
  });

  it('should return 500 when the security source fails', async () => {
    const brokenSource: SecuritySource = {
      load: async () => {
        throw new Error('disk unavailable');
      },
      savePrices: async () => undefined,
    };
    const app = createApp(new InvestmentPlanner({ source: brokenSource, refreshPrices: false }));
    const response = await request(app)
      .get('/api/calculate-investment')
      .query({ coveragePercent: 50, investmentAmount: 1000 });

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'Internal server error', message: 'disk unavailable' });
  });
});

describe('GET /api/sip', () => {
  it('should return rows and summary', async () => {
    const response = await request(appWith([]))
      .get('/api/sip')
      .query({ years: 1, annualInterestRate: 12, monthlyInvestment: 1000 });

    expect(response.status).toBe(200);
    expect(response.body.success).toBe(true);
    expect(response.body.rows).toHaveLength(1);
    expect(response.body.rows[0].netBalance).toBe(12682.5);
    expect(response.body.summary.finalCorpusFormatted).toBe('12,682.50');
  });

  it('should include a Year 0 row for an initial balance', async () => {
    const response = await request(appWith([]))
      .get('/api/sip')
      .query({ initialBalance: 10000, years: 1, annualInterestRate: 12, monthlyInvestment: 0 });

    expect(response.status).toBe(200);
    expect(response.body.rows.map((row: { year: number }) => row.year)).toEqual([0, 1]);
  });

  it('should return 400 for a missing horizon', async () => {
    const response = await request(appWith([]))
      .get('/api/sip')
      .query({ annualInterestRate: 12, monthlyInvestment: 1000 });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: 'MissingRequiredField',
      message: 'Missing required field(s): query.years',
    });
  });

  it('should return 400 for a horizon above 60 years', async () => {
    const response = await request(appWith([]))
      .get('/api/sip')
      .query({ years: 61, annualInterestRate: 12, monthlyInvestment: 1000 });

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('InvalidRange');
  });
});
