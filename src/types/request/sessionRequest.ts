import { SessionStatus } from "../../common/common-enum";
import { PageRequest } from "../model/page.model";

export interface SessionCreateInput {
  workoutId?: string | null;
  scheduledDate?: Date | null;
  notes?: string;
}

export interface SessionCompleteInput {
  rating?: number;
  notes?: string;
  caloriesBurned?: number;
}

export interface SessionUpdateInput {
  scheduledDate?: Date | null;
  notes?: string;
  rating?: number | null;
  caloriesBurned?: number | null;
}

export interface SessionFilters extends PageRequest {
  status?: SessionStatus;
  dateFrom?: Date;
  dateTo?: Date;
}
