import type { ModelConfigInput } from "../src/Model.js"

export const buildPredatorPreyConfig = (): ModelConfigInput => ({
  problem_description: "How do prey and predator populations evolve when predators depend on prey for growth?",
  stocks: [
    { name: "Prey", initial_value: 40, unit: "animals" },
    { name: "Predators", initial_value: 9, unit: "animals" },
  ],
  parameters: {
    PreyBirthRate: { value: 0.1, unit: "1/week" },
    PredationRate: { value: 0.01, unit: "1/(animal*week)" },
    PredatorEfficiency: { value: 0.1, unit: "dimensionless" },
    PredatorDeathRate: { value: 0.1, unit: "1/week" },
  },
  auxiliaries: [
    {
      name: "Encounters",
      formula: "Prey * Predators * PredationRate.value",
      unit: "animals/week",
      description: "Prey caught per week",
    },
  ],
  flows: [
    { name: "PreyBirth", formula: "Prey * PreyBirthRate.value", unit: "animals/week" },
    { name: "Predation", formula: "Encounters", unit: "animals/week" },
    { name: "PredatorGrowth", formula: "Encounters * PredatorEfficiency.value", unit: "animals/week" },
    { name: "PredatorDeath", formula: "Predators * PredatorDeathRate['value']", unit: "animals/week" },
  ],
  flow_connections: [
    ["PreyBirth", "Prey", "inflow"],
    ["Predation", "Prey", "outflow"],
    { flow_name: "PredatorGrowth", stock_name: "Predators", direction: "inflow" },
    { flow_name: "PredatorDeath", stock_name: "Predators", direction: "outflow" },
  ],
  simulation_settings: {
    end_time: { value: 50, unit: "weeks" },
    dt: { value: 0.25, unit: "weeks" },
  },
})
