import { ThrottlePolicy } from "../types/policy";
import { ThrottleDecision } from "../types/decision";

export interface RateLimiter {
  consume(
    name: string,
    policy: ThrottlePolicy
  ): Promise<ThrottleDecision>;
}
