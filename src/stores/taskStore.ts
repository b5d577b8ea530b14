// src/stores/taskStore.ts
import mongoose, { Types } from 'mongoose';
import { TaskModel, ITask } from '../models';
import type { Task, TaskMode } from '../scheduling/types';

export type NewTask = Omit<Task, 'id' | 'createdAt'>;
export type TaskPatch = Partial<NewTask>;

export interface TaskFilter {
  mode?: TaskMode;
}

/**
 * Persistence boundary for tasks.
 */
export interface TaskStore {
  /** Newest first. */
  listTasks(filter?: TaskFilter): Promise<Task[]>;
  getTask(id: string): Promise<Task | null>;
  createTask(task: NewTask): Promise<Task>;
  updateTask(id: string, patch: TaskPatch): Promise<Task | null>;
  deleteTask(id: string): Promise<Task | null>;
}

type TaskDoc = ITask & { _id: Types.ObjectId };

export function toTask(doc: TaskDoc): Task {
  return {
    id: doc._id.toString(),
    title: doc.title,
    mode: doc.mode,
    userPriority: doc.userPriority,
    effectivePriority: doc.effectivePriority ?? doc.userPriority,
    priorityReason: doc.priorityReason ?? null,
    scheduledTime: doc.scheduledTime,
    status: doc.status,
    createdAt: doc.createdAt ? new Date(doc.createdAt) : new Date(0),
  };
}

export class MongoTaskStore implements TaskStore {
  async listTasks(filter: TaskFilter = {}): Promise<Task[]> {
    const query = filter.mode ? { mode: filter.mode } : {};
    const docs = await TaskModel.find(query).sort({ createdAt: -1, _id: -1 });
    return docs.map(toTask);
  }

  async getTask(id: string): Promise<Task | null> {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await TaskModel.findById(id);
    return doc ? toTask(doc) : null;
  }

  async createTask(task: NewTask): Promise<Task> {
    const doc = await TaskModel.create(task);
    return toTask(doc);
  }

  async updateTask(id: string, patch: TaskPatch): Promise<Task | null> {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await TaskModel.findByIdAndUpdate(id, patch, { new: true, runValidators: true });
    return doc ? toTask(doc) : null;
  }

  async deleteTask(id: string): Promise<Task | null> {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await TaskModel.findByIdAndDelete(id);
    return doc ? toTask(doc) : null;
  }
}
