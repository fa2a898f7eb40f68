export type BmiCategory = "Underweight" | "Normal weight" | "Overweight" | "Obesity";

export const BMI_CATEGORIES: readonly BmiCategory[] = ["Underweight", "Normal weight", "Overweight", "Obesity"];

export interface BmiResult {
  bmi: number;
  category: BmiCategory;
}

export interface UserProfile {
  readonly heightCm: number;
  readonly weightKg: number;
  /** rounded to 2 decimals, as shown and stored */
  readonly bmi: number;
  readonly bmiCategory: BmiCategory;
}

// Closed bands 18.5..24.9 and 25..29.9; anything above or between them is Obesity.
function classifyBmi(bmi: number): BmiCategory {
  if (bmi < 18.5) return "Underweight";
  if (bmi >= 18.5 && bmi <= 24.9) return "Normal weight";
  if (bmi >= 25 && bmi <= 29.9) return "Overweight";
  return "Obesity";
}

export function calculateBmi(weightKg: number, heightCm: number): BmiResult {
  const heightM = heightCm / 100;
  const bmi = weightKg / (heightM * heightM);
  return { bmi, category: classifyBmi(bmi) };
}

export function roundBmi(bmi: number): number {
  return Math.round(bmi * 100) / 100;
}

export function buildUserProfile(heightCm: number, weightKg: number): UserProfile {
  const { bmi, category } = calculateBmi(weightKg, heightCm);
  return Object.freeze({ heightCm, weightKg, bmi: roundBmi(bmi), bmiCategory: category });
}

export function describeBmi(profile: UserProfile): string {
  return `Your BMI is: ${profile.bmi.toFixed(2)} (${profile.bmiCategory})`;
}
