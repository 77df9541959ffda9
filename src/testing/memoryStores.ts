import { SessionStatus } from "../common/common-enum";
import { Clock } from "../common/clock";
import { StoreUnavailable, ValidationError } from "../common/errors";
import {
  Counted,
  ExerciseLogQuery,
  ExerciseLogRepository,
  ExerciseQuery,
  ExerciseRepository,
  ProfileRepository,
  SessionQuery,
  SessionRepository,
  Slice,
  WorkoutQuery,
  WorkoutRepository,
} from "../repositories/types";
import { IdentityPatch, IdentityStore, NewIdentity } from "../services/identityStore.service";
import { Exercise, NewExercise } from "../types/model/exercise.model";
import { ExerciseLog, NewExerciseLog } from "../types/model/exerciseLog.model";
import { Identity, IdentityWithCredentials } from "../types/model/identity.model";
import { Profile, ProfileFields, ProfilePatch } from "../types/model/profile.model";
import { IdentityId } from "../types/model/reference.model";
import { NewWorkout, Workout } from "../types/model/workout.model";
import { NewWorkoutSession, WorkoutSession } from "../types/model/workoutSession.model";
import { workoutCalculator } from "../utils/calculators";
import { STORE_NAMES } from "../utils/constants";

/** A clock that only moves when told to. */
export class FixedClock implements Clock {
  private current: Date;

  constructor(start: string | Date = "2024-03-01T10:00:00.000Z") {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current);
  }

  set(at: string | Date) {
    this.current = new Date(at);
  }

  advanceMinutes(minutes: number) {
    this.current = new Date(this.current.getTime() + minutes * 60_000);
  }
}

const page = <T>(items: T[], slice: Slice): Counted<T> => ({
  count: items.length,
  results: items.slice(slice.skip, slice.skip + slice.limit),
});

const matchesSearch = (name: string, search?: string) =>
  !search || name.toLowerCase().includes(search.toLowerCase());

/** Id-keyed rows, copied in and out so callers never share references with the store. */
class MemoryTable<T extends { id: string }> {
  private rows = new Map<string, T>();
  private sequence = 0;

  constructor(private readonly prefix: string) {}

  nextId(): string {
    this.sequence += 1;
    return `${this.prefix}-${this.sequence}`;
  }

  get(id: string): T | null {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }

  put(row: T): T {
    this.rows.set(row.id, structuredClone(row));
    return structuredClone(row);
  }

  remove(id: string): boolean {
    return this.rows.delete(id);
  }

  all(): T[] {
    return [...this.rows.values()].map((row) => structuredClone(row));
  }
}

/**
 * Shared switch for the document store. While `down`, every repository
 * backed by it throws StoreUnavailable, like the mongoose guard does.
 */
export class DocumentStoreState {
  down = false;

  guard(store: string) {
    if (this.down) throw new StoreUnavailable(store, new Error("connection refused"));
  }
}

export class MemoryProfileRepository implements ProfileRepository {
  private profiles = new Map<IdentityId, Profile>();

  constructor(
    private readonly state = new DocumentStoreState(),
    private readonly clock: Clock = { now: () => new Date() }
  ) {}

  async findByIdentity(identityId: IdentityId): Promise<Profile | null> {
    this.state.guard(STORE_NAMES.PROFILE);
    const profile = this.profiles.get(identityId);
    return profile ? structuredClone(profile) : null;
  }

  async createIfAbsent(identityId: IdentityId, fields: ProfileFields): Promise<Profile> {
    this.state.guard(STORE_NAMES.PROFILE);
    const existing = this.profiles.get(identityId);
    if (existing) return structuredClone(existing);

    const now = this.clock.now();
    const profile: Profile = { identityId, ...structuredClone(fields), createdAt: now, updatedAt: now };
    this.profiles.set(identityId, profile);
    return structuredClone(profile);
  }

  async update(identityId: IdentityId, patch: ProfilePatch): Promise<Profile | null> {
    this.state.guard(STORE_NAMES.PROFILE);
    const existing = this.profiles.get(identityId);
    if (!existing) return null;
    const updated: Profile = { ...existing, ...structuredClone(patch), updatedAt: this.clock.now() };
    this.profiles.set(identityId, updated);
    return structuredClone(updated);
  }

  count(): number {
    return this.profiles.size;
  }
}

export class MemoryExerciseRepository implements ExerciseRepository {
  private table = new MemoryTable<Exercise>("exercise");

  constructor(
    private readonly state = new DocumentStoreState(),
    private readonly clock: Clock = { now: () => new Date() }
  ) {}

  async findById(id: string): Promise<Exercise | null> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    return this.table.get(id);
  }

  async findByIds(ids: string[]): Promise<Exercise[]> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    return ids.flatMap((id) => this.table.get(id) ?? []);
  }

  async create(exercise: NewExercise): Promise<Exercise> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    const now = this.clock.now();
    return this.table.put({ ...exercise, id: this.table.nextId(), createdAt: now, updatedAt: now });
  }

  async update(id: string, patch: Partial<NewExercise>): Promise<Exercise | null> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    const existing = this.table.get(id);
    if (!existing) return null;
    return this.table.put({ ...existing, ...patch, updatedAt: this.clock.now() });
  }

  async delete(id: string): Promise<boolean> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    return this.table.remove(id);
  }

  async list(query: ExerciseQuery, slice: Slice): Promise<Counted<Exercise>> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    const matches = this.table
      .all()
      .filter(
        (e) =>
          !e.isCustom ||
          e.isPublic ||
          (query.visibleTo !== null && e.ownerIdentityId === query.visibleTo)
      )
      .filter((e) => !query.category || e.category === query.category)
      .filter((e) => !query.difficulty || e.difficulty === query.difficulty)
      .filter(
        (e) =>
          !query.muscleGroup ||
          e.primaryMuscles.includes(query.muscleGroup) ||
          e.secondaryMuscles.includes(query.muscleGroup)
      )
      .filter((e) => matchesSearch(e.name, query.search))
      .sort((a, b) => a.name.localeCompare(b.name));
    return page(matches, slice);
  }
}

export class MemoryWorkoutRepository implements WorkoutRepository {
  private table = new MemoryTable<Workout>("workout");

  constructor(
    private readonly state = new DocumentStoreState(),
    private readonly clock: Clock = { now: () => new Date() }
  ) {}

  async findById(id: string): Promise<Workout | null> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    return this.table.get(id);
  }

  async create(workout: NewWorkout): Promise<Workout> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    const now = this.clock.now();
    return this.table.put({ ...workout, id: this.table.nextId(), createdAt: now, updatedAt: now });
  }

  async update(id: string, patch: Partial<NewWorkout>): Promise<Workout | null> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    const existing = this.table.get(id);
    if (!existing) return null;
    return this.table.put({ ...existing, ...patch, updatedAt: this.clock.now() });
  }

  async delete(id: string): Promise<boolean> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    return this.table.remove(id);
  }

  async list(query: WorkoutQuery, slice: Slice): Promise<Counted<Workout>> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    const tags = query.tags ?? [];
    const matches = this.table
      .all()
      .filter(
        (w) => w.isPublic || (query.visibleTo !== null && w.ownerIdentityId === query.visibleTo)
      )
      .filter((w) => !query.difficulty || w.difficulty === query.difficulty)
      .filter((w) => tags.length === 0 || w.tags.some((tag) => tags.includes(tag)))
      .filter((w) => matchesSearch(w.name, query.search))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    return page(matches, slice);
  }
}

export class MemorySessionRepository implements SessionRepository {
  private table = new MemoryTable<WorkoutSession>("session");

  constructor(
    private readonly state = new DocumentStoreState(),
    private readonly clock: Clock = { now: () => new Date() }
  ) {}

  async findById(id: string): Promise<WorkoutSession | null> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    return this.table.get(id);
  }

  async create(session: NewWorkoutSession): Promise<WorkoutSession> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    const now = this.clock.now();
    return this.table.put({ ...session, id: this.table.nextId(), createdAt: now, updatedAt: now });
  }

  async update(id: string, patch: Partial<NewWorkoutSession>): Promise<WorkoutSession | null> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    const existing = this.table.get(id);
    if (!existing) return null;
    return this.table.put({ ...existing, ...patch, updatedAt: this.clock.now() });
  }

  async transition(
    id: string,
    ownerIdentityId: IdentityId,
    from: SessionStatus[],
    patch: Partial<NewWorkoutSession>
  ): Promise<WorkoutSession | null> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    const existing = this.table.get(id);
    if (
      !existing ||
      existing.ownerIdentityId !== ownerIdentityId ||
      !from.includes(existing.status)
    ) {
      return null;
    }
    return this.table.put({ ...existing, ...patch, updatedAt: this.clock.now() });
  }

  async delete(id: string): Promise<boolean> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    return this.table.remove(id);
  }

  async list(query: SessionQuery, slice: Slice): Promise<Counted<WorkoutSession>> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    const moment = (s: WorkoutSession) => workoutCalculator.sessionMoment(s).getTime();
    const matches = this.table
      .all()
      .filter((s) => s.ownerIdentityId === query.ownerIdentityId)
      .filter((s) => !query.status || s.status === query.status)
      .filter((s) => !query.dateFrom || moment(s) >= query.dateFrom.getTime())
      .filter((s) => !query.dateTo || moment(s) <= query.dateTo.getTime())
      .sort((a, b) => moment(b) - moment(a));
    return page(matches, slice);
  }

  /** Simulates a concurrent writer changing the row behind the service's back. */
  forceStatus(id: string, status: SessionStatus) {
    const existing = this.table.get(id);
    if (existing) this.table.put({ ...existing, status });
  }
}

export class MemoryExerciseLogRepository implements ExerciseLogRepository {
  private table = new MemoryTable<ExerciseLog>("log");

  constructor(
    private readonly state = new DocumentStoreState(),
    private readonly clock: Clock = { now: () => new Date() }
  ) {}

  async findById(id: string): Promise<ExerciseLog | null> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    return this.table.get(id);
  }

  async create(log: NewExerciseLog): Promise<ExerciseLog> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    if (await this.hasSetNumber(log.sessionId, log.exerciseId, log.setNumber)) {
      throw new ValidationError(`set ${log.setNumber} is already logged for this exercise`);
    }
    return this.table.put({ ...log, id: this.table.nextId(), createdAt: this.clock.now() });
  }

  async update(id: string, patch: Partial<NewExerciseLog>): Promise<ExerciseLog | null> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    const existing = this.table.get(id);
    if (!existing) return null;
    return this.table.put({ ...existing, ...patch });
  }

  async delete(id: string): Promise<boolean> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    return this.table.remove(id);
  }

  async deleteBySession(sessionId: string): Promise<number> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    const doomed = this.table.all().filter((log) => log.sessionId === sessionId);
    doomed.forEach((log) => this.table.remove(log.id));
    return doomed.length;
  }

  async listBySession(sessionId: string): Promise<ExerciseLog[]> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    return this.table
      .all()
      .filter((log) => log.sessionId === sessionId)
      .sort((a, b) => a.exerciseId.localeCompare(b.exerciseId) || a.setNumber - b.setNumber);
  }

  async maxSetNumber(sessionId: string, exerciseId: string): Promise<number> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    return this.table
      .all()
      .filter((log) => log.sessionId === sessionId && log.exerciseId === exerciseId)
      .reduce((max, log) => Math.max(max, log.setNumber), 0);
  }

  async hasSetNumber(sessionId: string, exerciseId: string, setNumber: number): Promise<boolean> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    return this.table
      .all()
      .some(
        (log) =>
          log.sessionId === sessionId &&
          log.exerciseId === exerciseId &&
          log.setNumber === setNumber
      );
  }

  async list(query: ExerciseLogQuery, slice: Slice): Promise<Counted<ExerciseLog>> {
    this.state.guard(STORE_NAMES.DOCUMENT);
    const matches = this.table
      .all()
      .filter((log) => query.ownerIdentityId === undefined || log.ownerIdentityId === query.ownerIdentityId)
      .filter((log) => !query.sessionId || log.sessionId === query.sessionId)
      .filter((log) => !query.exerciseId || log.exerciseId === query.exerciseId)
      .reverse();
    return page(matches, slice);
  }
}

/** Identity store over plain maps. `down` makes every call fail like an unreachable database. */
export class MemoryIdentityStore implements IdentityStore {
  down = false;
  private users = new Map<IdentityId, IdentityWithCredentials>();
  private tokens = new Map<IdentityId, string>();
  private sequence = 0;
  private tokenSequence = 0;

  async findById(id: IdentityId): Promise<Identity | null> {
    const found = await this.findCredentials(id);
    return found ? this.strip(found) : null;
  }

  async findByUsername(username: string): Promise<IdentityWithCredentials | null> {
    this.guard();
    const found = [...this.users.values()].find((user) => user.username === username);
    return found ? { ...found } : null;
  }

  async findCredentials(id: IdentityId): Promise<IdentityWithCredentials | null> {
    this.guard();
    const found = this.users.get(id);
    return found ? { ...found } : null;
  }

  async isUsernameTaken(username: string): Promise<boolean> {
    return (await this.findByUsername(username)) !== null;
  }

  async isEmailTaken(email: string, exceptId?: IdentityId): Promise<boolean> {
    this.guard();
    return [...this.users.values()].some(
      (user) => user.email.toLowerCase() === email.toLowerCase() && user.id !== exceptId
    );
  }

  async create(identity: NewIdentity): Promise<Identity> {
    this.guard();
    this.sequence += 1;
    const user: IdentityWithCredentials = {
      id: this.sequence,
      username: identity.username,
      email: identity.email,
      passwordHash: identity.passwordHash,
      firstName: identity.firstName,
      lastName: identity.lastName,
      isStaff: identity.isStaff ?? false,
      createdAt: new Date("2024-03-01T09:00:00.000Z"),
    };
    this.users.set(user.id, user);
    return this.strip(user);
  }

  async update(id: IdentityId, patch: IdentityPatch): Promise<Identity | null> {
    this.guard();
    const existing = this.users.get(id);
    if (!existing) return null;
    const updated: IdentityWithCredentials = {
      ...existing,
      email: patch.email ?? existing.email,
      firstName: patch.firstName ?? existing.firstName,
      lastName: patch.lastName ?? existing.lastName,
    };
    this.users.set(id, updated);
    return this.strip(updated);
  }

  async setPasswordHash(id: IdentityId, passwordHash: string): Promise<void> {
    this.guard();
    const existing = this.users.get(id);
    if (existing) this.users.set(id, { ...existing, passwordHash });
  }

  async issueToken(id: IdentityId): Promise<string> {
    this.guard();
    return this.tokens.get(id) ?? this.rotateToken(id);
  }

  async rotateToken(id: IdentityId): Promise<string> {
    this.guard();
    this.tokenSequence += 1;
    const token = `token-${id}-${this.tokenSequence}`;
    this.tokens.set(id, token);
    return token;
  }

  async revokeToken(id: IdentityId): Promise<void> {
    this.guard();
    this.tokens.delete(id);
  }

  async resolveCaller(token: string): Promise<Identity | null> {
    this.guard();
    for (const [id, key] of this.tokens) {
      if (key === token) return this.findById(id);
    }
    return null;
  }

  private guard() {
    if (this.down) {
      throw new StoreUnavailable(STORE_NAMES.IDENTITY, new Error("connection refused"));
    }
  }

  private strip(user: IdentityWithCredentials): Identity {
    return {
      id: user.id,
      username: user.username,
      email: user.email,
      firstName: user.firstName,
      lastName: user.lastName,
      isStaff: user.isStaff,
      createdAt: user.createdAt,
    };
  }
}

/** One document-store state shared by every repository, plus a fixed clock. */
export const createMemoryStores = (clock = new FixedClock()) => {
  const state = new DocumentStoreState();
  return {
    clock,
    state,
    profiles: new MemoryProfileRepository(state, clock),
    exercises: new MemoryExerciseRepository(state, clock),
    workouts: new MemoryWorkoutRepository(state, clock),
    sessions: new MemorySessionRepository(state, clock),
    logs: new MemoryExerciseLogRepository(state, clock),
    identities: new MemoryIdentityStore(),
  };
};
