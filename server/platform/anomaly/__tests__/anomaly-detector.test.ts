/**
 * 检测器门面测试
 */
import { describe, it, expect } from 'vitest';
import {
  AnomalyDetector,
  RuleBase,
  UNDETERMINED_LABEL,
  and,
  createAnomalyDetector,
  createInputVariables,
  createOutputVariable,
  term,
} from '../index';
import { InputOutOfRangeError, ValidationError } from '../../../core/errors';
import { config } from '../../../core/config';
import { validateConfigOrThrow } from '../../../core/config-schema';
import { getLogLevel, setLogLevel } from '../../../core/logger';

describe('AnomalyDetector.evaluate', () => {
  const detector = createAnomalyDetector({ ruleSet: 'canonical', resolution: 0.01, uncoveredPolicy: 'undetermined' });

  it('全低指标 → normal，分数靠近低端', () => {
    const { score, label } = detector.evaluate(0, 0, 0);
    expect(label).toBe('normal');
    expect(score).toBeLessThan(1.5);
  });

  it('全高指标 → strongly_anomalous，分数靠近高端', () => {
    const { score, label } = detector.evaluate(1, 1, 1);
    expect(label).toBe('strongly_anomalous');
    expect(score).toBeGreaterThan(8);
  });

  it('evaluate(1.5, 0, 0) 抛 InputOutOfRangeError', () => {
    expect(() => detector.evaluate(1.5, 0, 0)).toThrow(InputOutOfRangeError);
  });

  it('evaluateIndicators 与 evaluate 等价', () => {
    expect(detector.evaluateIndicators({ forecastError: 0.2, varianceChange: 0.5, correlationChange: 0.1 }))
      .toEqual(detector.evaluate(0.2, 0.5, 0.1));
  });

  it('配置冻结', () => {
    expect(Object.isFrozen(detector.config)).toBe(true);
    expect(detector.config.ruleBase.isFrozen).toBe(true);
    expect(detector.config.ruleBase.size).toBe(9);
  });
});

describe('createAnomalyDetector 应用运行时配置', () => {
  it('校验后的日志级别写入全局日志器', () => {
    const previous = getLogLevel();
    const expected = validateConfigOrThrow(config).app.logLevel;
    setLogLevel(expected === 'fatal' ? 'trace' : 'fatal');

    createAnomalyDetector();

    expect(getLogLevel()).toBe(expected);
    setLogLevel(previous);
  });
});

describe('规则集选择', () => {
  it('extended 规则集覆盖两两组合，canonical 不覆盖', () => {
    const canonical = createAnomalyDetector({ ruleSet: 'canonical' });
    const extended = createAnomalyDetector({ ruleSet: 'extended' });

    // EP = medium，MV = low，MC = medium
    expect(canonical.evaluate(0.5, 0, 0.5).label).toBe(UNDETERMINED_LABEL);

    const result = extended.evaluate(0.5, 0, 0.5);
    expect(result.label).toBe('moderately_anomalous');
    expect(result.score).toBeCloseTo(5, 6);
    expect(extended.config.ruleBase.size).toBe(14);
  });

  it('nearest-rule 策略给出最近规则的结论，距离相等取规则顺序靠前者', () => {
    const detector = createAnomalyDetector({ ruleSet: 'canonical', uncoveredPolicy: 'nearest-rule' });
    // (medium, low, low) 与 (medium, medium, medium) 到 (0.5, 0, 0.5) 的距离都是 0.25
    const result = detector.evaluate(0.5, 0, 0.5);
    expect(result.interpolated).toBe(true);
    expect(result.label).toBe('slightly_anomalous');
    expect(result.score).toBe(3);
  });
});

describe('独立配置并存', () => {
  it('自定义检测器不影响默认检测器', () => {
    const degenerate = new AnomalyDetector({
      inputs: createInputVariables(),
      output: createOutputVariable(),
      ruleBase: new RuleBase([{
        id: 'only_all_high',
        antecedent: and(term('forecast_error', 'high'), term('variance_change', 'high'), term('correlation_change', 'high')),
        consequent: 'strongly_anomalous',
      }]),
      resolution: 0.01,
      uncoveredPolicy: 'undetermined',
    });
    const standard = createAnomalyDetector({ ruleSet: 'canonical' });

    const silent = degenerate.evaluate(0, 0, 0);
    expect(silent.score).toBe(5);
    expect(silent.undetermined).toBe(true);
    expect(standard.evaluate(0, 0, 0).label).toBe('normal');
  });
});

describe('AnomalyDetector.evaluateWindow', () => {
  const detector = createAnomalyDetector({ ruleSet: 'canonical' });
  const rows = [[1, 2], [2, 4], [3, 6], [4, 8]];

  it('窗口与基线相同：只有预测误差非零', () => {
    const assessment = detector.evaluateWindow(rows, rows);
    // MAE = 1，range = 3
    expect(assessment.indicators.forecastError).toBeCloseTo(1 / 3, 5);
    expect(assessment.indicators.varianceChange).toBe(0);
    expect(assessment.indicators.correlationChange).toBe(0);
    expect(assessment.label).toBe('slightly_anomalous');
    expect(assessment.score).toBeGreaterThan(1);
    expect(assessment.score).toBeLessThan(5);
  });

  it('20 万行长窗口正常评估', () => {
    const long = Array.from({ length: 200_000 }, (_, i) => (i % 2 === 0 ? [0, 0] : [10, 10]));
    const assessment = detector.evaluateWindow(long, long);
    // 基线均值 5 作为预测：MAE = 5，range = 10
    expect(assessment.indicators.forecastError).toBeCloseTo(0.5, 5);
    expect(assessment.indicators.varianceChange).toBe(0);
    expect(assessment.indicators.correlationChange).toBe(0);
    expect(assessment.label).toBe('slightly_anomalous');
  });

  it('列数不一致抛 ValidationError', () => {
    expect(() => detector.evaluateWindow([[1, 2, 3]], rows)).toThrow(ValidationError);
  });
});
