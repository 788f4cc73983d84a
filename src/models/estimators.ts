/**
 * Schätzer für das ModelBundle
 * - Standardisierung (z-Score) der Features
 * - Gaussian Naive Bayes für Action- und Direction-Klassifikation
 * - Ridge-Regression für die erwartete Rendite (Magnitude)
 *
 * Alle Parameter sind reine JSON-Daten, damit ein Bundle versioniert in SQLite liegen kann.
 */

import { Matrix, solve } from 'ml-matrix';
import * as ss from 'simple-statistics';

// ═══════════════════════════════════════════════════════════════
//                         PARAMETER
// ═══════════════════════════════════════════════════════════════

export interface ScalerParams {
  means: number[];
  stds: number[];
}

export interface NaiveBayesParams {
  classes: string[];
  priors: number[];
  means: number[][];
  variances: number[][];
}

export interface RidgeParams {
  intercept: number;
  weights: number[];
  lambda: number;
}

export interface ClassPrediction {
  label: string;
  probability: number;
  probabilities: Record<string, number>;
}

// ═══════════════════════════════════════════════════════════════
//                       STANDARDISIERUNG
// ═══════════════════════════════════════════════════════════════

export function fitScaler(rows: number[][]): ScalerParams {
  if (rows.length === 0) {
    throw new Error('Scaler benötigt mindestens eine Zeile');
  }

  const width = rows[0].length;
  const means: number[] = [];
  const stds: number[] = [];

  for (let j = 0; j < width; j++) {
    const column = rows.map((row) => row[j]);
    means.push(ss.mean(column));
    const std = column.length > 1 ? ss.standardDeviation(column) : 0;
    // Konstante Features nicht skalieren
    stds.push(std > 1e-12 ? std : 1);
  }

  return { means, stds };
}

export function transform(scaler: ScalerParams, row: number[]): number[] {
  if (row.length !== scaler.means.length) {
    throw new Error(`Feature-Anzahl ${row.length} passt nicht zum Scaler (${scaler.means.length})`);
  }
  return row.map((value, j) => (value - scaler.means[j]) / scaler.stds[j]);
}

// ═══════════════════════════════════════════════════════════════
//                     GAUSSIAN NAIVE BAYES
// ═══════════════════════════════════════════════════════════════

/**
 * @param varSmoothing - Anteil der größten Feature-Varianz, der jeder Varianz addiert wird
 */
export function fitNaiveBayes(rows: number[][], labels: string[], varSmoothing: number = 1e-3): NaiveBayesParams {
  if (rows.length !== labels.length || rows.length === 0) {
    throw new Error('Naive Bayes: Zeilen und Labels müssen gleich lang und nicht leer sein');
  }

  const classes = [...new Set(labels)].sort();
  const width = rows[0].length;

  let maxVariance = 0;
  for (let j = 0; j < width; j++) {
    const column = rows.map((row) => row[j]);
    maxVariance = Math.max(maxVariance, column.length > 1 ? ss.variance(column) : 0);
  }
  const epsilon = Math.max(varSmoothing * maxVariance, 1e-9);

  const priors: number[] = [];
  const means: number[][] = [];
  const variances: number[][] = [];

  for (const cls of classes) {
    const members = rows.filter((_, i) => labels[i] === cls);
    priors.push(members.length / rows.length);

    const classMeans: number[] = [];
    const classVariances: number[] = [];
    for (let j = 0; j < width; j++) {
      const column = members.map((row) => row[j]);
      classMeans.push(ss.mean(column));
      classVariances.push((column.length > 1 ? ss.variance(column) : 0) + epsilon);
    }
    means.push(classMeans);
    variances.push(classVariances);
  }

  return { classes, priors, means, variances };
}

export function predictNaiveBayes(params: NaiveBayesParams, row: number[]): ClassPrediction {
  const logScores = params.classes.map((_, c) => {
    let score = Math.log(params.priors[c]);
    for (let j = 0; j < row.length; j++) {
      const variance = params.variances[c][j];
      const diff = row[j] - params.means[c][j];
      score += -0.5 * Math.log(2 * Math.PI * variance) - (diff * diff) / (2 * variance);
    }
    return score;
  });

  // Softmax mit Max-Shift gegen Underflow
  const maxScore = Math.max(...logScores);
  const exps = logScores.map((s) => Math.exp(s - maxScore));
  const total = exps.reduce((a, b) => a + b, 0);

  const probabilities: Record<string, number> = {};
  let best = 0;
  params.classes.forEach((cls, c) => {
    probabilities[cls] = exps[c] / total;
    if (exps[c] > exps[best]) best = c;
  });

  return {
    label: params.classes[best],
    probability: probabilities[params.classes[best]],
    probabilities,
  };
}

// ═══════════════════════════════════════════════════════════════
//                       RIDGE REGRESSION
// ═══════════════════════════════════════════════════════════════

export function fitRidge(rows: number[][], targets: number[], lambda: number = 1): RidgeParams {
  if (rows.length !== targets.length || rows.length === 0) {
    throw new Error('Ridge: Zeilen und Targets müssen gleich lang und nicht leer sein');
  }

  const width = rows[0].length;
  // Spalte 0 = Intercept
  const X = new Matrix(rows.map((row) => [1, ...row]));
  const y = Matrix.columnVector(targets);

  const penalty = Matrix.eye(width + 1, width + 1).mul(lambda);
  penalty.set(0, 0, 0);  // Intercept nicht regularisieren

  const xt = X.transpose();
  const lhs = xt.mmul(X).add(penalty);
  const rhs = xt.mmul(y);
  const solution = solve(lhs, rhs).to1DArray();

  return {
    intercept: solution[0],
    weights: solution.slice(1),
    lambda,
  };
}

export function predictRidge(params: RidgeParams, row: number[]): number {
  let value = params.intercept;
  for (let j = 0; j < row.length; j++) {
    value += params.weights[j] * row[j];
  }
  return value;
}
