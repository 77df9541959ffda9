import { Difficulty, ExerciseCategory, MuscleGroup } from "../common/common-enum";
import { NewExercise } from "../types/model/exercise.model";
import { IdentityId } from "../types/model/reference.model";

export const sharedExercise = (overrides: Partial<NewExercise> = {}): NewExercise => ({
  name: "Bench Press",
  description: "",
  category: ExerciseCategory.STRENGTH,
  difficulty: Difficulty.INTERMEDIATE,
  primaryMuscles: [MuscleGroup.CHEST],
  secondaryMuscles: [MuscleGroup.TRICEPS],
  equipment: ["barbell"],
  instructions: [],
  videoUrl: "",
  imageUrl: "",
  isCustom: false,
  ownerIdentityId: null,
  isPublic: true,
  ...overrides,
});

export const customExercise = (
  ownerId: IdentityId,
  overrides: Partial<NewExercise> = {}
): NewExercise =>
  sharedExercise({
    name: "Band Pull Apart",
    isCustom: true,
    ownerIdentityId: ownerId,
    isPublic: false,
    ...overrides,
  });
