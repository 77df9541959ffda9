export enum FitnessGoal {
  STRENGTH = "strength",
  CARDIO = "cardio",
  WEIGHT_LOSS = "weight_loss",
  WEIGHT_GAIN = "weight_gain",
  ENDURANCE = "endurance",
  FLEXIBILITY = "flexibility",
  GENERAL = "general",
}

export enum ExperienceLevel {
  BEGINNER = "beginner",
  INTERMEDIATE = "intermediate",
  ADVANCED = "advanced",
}

export enum ExerciseCategory {
  STRENGTH = "strength",
  CARDIO = "cardio",
  FLEXIBILITY = "flexibility",
  BALANCE = "balance",
  PLYOMETRIC = "plyometric",
  OLYMPIC = "olympic",
  POWERLIFTING = "powerlifting",
}

export enum Difficulty {
  BEGINNER = "beginner",
  INTERMEDIATE = "intermediate",
  ADVANCED = "advanced",
  EXPERT = "expert",
}

export enum MuscleGroup {
  CHEST = "chest",
  BACK = "back",
  SHOULDERS = "shoulders",
  BICEPS = "biceps",
  TRICEPS = "triceps",
  FOREARMS = "forearms",
  CORE = "core",
  GLUTES = "glutes",
  QUADRICEPS = "quadriceps",
  HAMSTRINGS = "hamstrings",
  CALVES = "calves",
  FULL_BODY = "full_body",
}

export enum SessionStatus {
  PLANNED = "planned",
  IN_PROGRESS = "in_progress",
  COMPLETED = "completed",
  CANCELLED = "cancelled",
}
