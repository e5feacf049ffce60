import { Inject, Injectable } from '@nestjs/common';
import { GROUND_POLICY } from '../../tokens';
import { GroundPolicy } from '../policy/ground-policy';
import { DayType } from '../types/day-type.enum';
import { FeeBreakdown } from '../types/fee-breakdown.type';
import { LoggerService } from '../../infrastructure/logging/logger.service';

@Injectable()
export class PricingPolicyService {
  constructor(
    @Inject(GROUND_POLICY)
    private readonly policy: GroundPolicy,
    private readonly logger: LoggerService,
  ) {}

  /**
   * Fee for one request. Rates are whole yen, so the total is exact.
   * An unknown category is priced at the default tier and logged.
   */
  computeFee(category: string, dayType: DayType, hours: number): FeeBreakdown {
    const resolved = this.resolveCategory(category);
    const rates = this.policy.pricing.categories[resolved];
    const ratePerHour =
      dayType === DayType.WEEKEND_OR_HOLIDAY ? rates.weekend : rates.weekday;

    return {
      category: resolved,
      categoryLabel: rates.label,
      dayType,
      ratePerHour,
      hours,
      total: ratePerHour * hours,
      paymentMethod: this.policy.pricing.paymentMethod,
    };
  }

  isKnownCategory(category: string): boolean {
    return Object.prototype.hasOwnProperty.call(
      this.policy.pricing.categories,
      category,
    );
  }

  get defaultCategory(): string {
    return this.policy.pricing.defaultCategory;
  }

  private resolveCategory(category: string): string {
    if (this.isKnownCategory(category)) {
      return category;
    }

    this.logger.warn('Unknown category, pricing at default tier', {
      category,
      fallback: this.policy.pricing.defaultCategory,
    });
    return this.policy.pricing.defaultCategory;
  }
}
