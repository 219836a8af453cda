import { DEFAULT_POLICY, getLoanAmount, isCgtApplicable } from '../../models/Scenario';
import { baseBuyScenario } from '../fixtures/scenarios';

describe('getLoanAmount', () => {
  it('should borrow the property value less the deposit', () => {
    expect(getLoanAmount(300000, 60000)).toBe(240000);
  });

  it('should borrow nothing for a cash purchase', () => {
    expect(getLoanAmount(200000, 200000)).toBe(0);
  });
});

describe('isCgtApplicable', () => {
  it('should exempt a primary residence by default', () => {
    expect(isCgtApplicable(baseBuyScenario, DEFAULT_POLICY.cgtPolicy)).toBe(false);
  });

  it('should charge a second home', () => {
    expect(isCgtApplicable({ ...baseBuyScenario, isSecondHome: true }, 'second_home_only')).toBe(true);
  });

  it('should charge every sale under the always policy', () => {
    expect(isCgtApplicable(baseBuyScenario, 'always')).toBe(true);
  });
});
