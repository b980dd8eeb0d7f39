export interface CrewPreferences {
  jobTypes: string[];
  constructionTypes: string[];
  minHourlyRate?: number;
  maxDistanceMiles?: number;
  preferredCompanies: string[];
  requiredSkills: string[];
  autoShareEnabled: boolean;
  matchThreshold: number; // 0-100
}

export const DEFAULT_CREW_PREFERENCES: CrewPreferences = {
  jobTypes: [],
  constructionTypes: [],
  preferredCompanies: [],
  requiredSkills: [],
  autoShareEnabled: false,
  matchThreshold: 50,
};

export type CrewPreferencePreset = 'lineman' | 'insideWireman' | 'treeTrimmer' | 'stormWork';

export const CREW_PREFERENCE_PRESETS: Record<CrewPreferencePreset, CrewPreferences> = {
  lineman: {
    jobTypes: ['Journeyman Lineman'],
    constructionTypes: ['Distribution', 'Transmission', 'Sub Station'],
    minHourlyRate: 45,
    maxDistanceMiles: 100,
    preferredCompanies: ['IBEW Local Unions', 'Quanta Services', 'MYR Group'],
    requiredSkills: ['Overhead Distribution', 'CDL License'],
    autoShareEnabled: true,
    matchThreshold: 60,
  },
  insideWireman: {
    jobTypes: ['Journeyman Wireman', 'Journeyman Electrician'],
    constructionTypes: ['Commercial', 'Industrial', 'Data Center'],
    minHourlyRate: 35,
    maxDistanceMiles: 50,
    preferredCompanies: ['NECA Contractors', 'IBEW Local Unions'],
    requiredSkills: ['OSHA 30'],
    autoShareEnabled: true,
    matchThreshold: 50,
  },
  treeTrimmer: {
    jobTypes: ['Journeyman Tree Trimmer'],
    constructionTypes: ['Distribution', 'Transmission'],
    minHourlyRate: 30,
    maxDistanceMiles: 75,
    preferredCompanies: ['IBEW Local Unions'],
    requiredSkills: ['CDL License'],
    autoShareEnabled: true,
    matchThreshold: 55,
  },
  stormWork: {
    jobTypes: ['Journeyman Lineman', 'Operator'],
    constructionTypes: ['Distribution', 'Transmission', 'Underground'],
    minHourlyRate: 50,
    maxDistanceMiles: 500,
    preferredCompanies: ['PowerTeam Services', 'Summit Line Construction', 'Quanta Services'],
    requiredSkills: ['Overhead Distribution', 'CDL License', 'Crane Operation'],
    autoShareEnabled: true,
    matchThreshold: 40,
  },
};
