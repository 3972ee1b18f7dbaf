import { CalculatorSession, type CalculatorSessionOptions } from "@minwool/engine";

export interface IStorage {
  // Calculator state (one session per server process)
  getCalculator(): Promise<CalculatorSession>;
  resetCalculator(): Promise<CalculatorSession>;
}

export class MemStorage implements IStorage {
  private calculator: CalculatorSession;

  constructor(private readonly options: CalculatorSessionOptions = {}) {
    this.calculator = new CalculatorSession(options);
  }

  async getCalculator(): Promise<CalculatorSession> {
    return this.calculator;
  }

  async resetCalculator(): Promise<CalculatorSession> {
    this.calculator = new CalculatorSession(this.options);
    return this.calculator;
  }
}

export const storage = new MemStorage();
