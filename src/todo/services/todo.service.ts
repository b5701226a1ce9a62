import { Injectable, NotFoundException, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { QueryResponse } from '../../common/dto/query-response.dto';
import { Todo } from '../entities/todo.entity';
import { CreateTodoDto } from '../dto/create-todo.dto';
import { UpdateTodoDto } from '../dto/update-todo.dto';
import { QueryTodosDto } from '../dto/query-todos.dto';

/**
 * Process-local todo list. Map iteration order keeps results in creation
 * order.
 */
@Injectable()
export class TodoService {
  private readonly logger = new Logger(TodoService.name);
  private todos: Map<string, Todo> = new Map();

  queryTodos(query: QueryTodosDto): QueryResponse<Todo> {
    const ids = query.ids && query.ids.length > 0 ? new Set(query.ids) : null;
    const text = query.text_contains?.toLowerCase();

    const results = Array.from(this.todos.values()).filter(
      (todo) =>
        (query.id === undefined || todo.id === query.id) &&
        (ids === null || ids.has(todo.id)) &&
        (text === undefined || todo.text.toLowerCase().includes(text)),
    );

    return new QueryResponse(0, results.length, results);
  }

  createTodo(dto: CreateTodoDto): Todo {
    const todo = new Todo(uuidv4(), dto.text);
    this.todos.set(todo.id, todo);
    this.logger.log(`Todo ${todo.id} created`);
    return todo;
  }

  updateTodo(id: string, dto: UpdateTodoDto): Todo {
    const todo = this.findTodo(id);

    if (dto.text !== undefined) {
      todo.text = dto.text;
    }
    if (dto.is_finished !== undefined) {
      todo.is_finished = dto.is_finished;
    }

    this.logger.log(`Todo ${id} updated`);
    return todo;
  }

  deleteTodo(id: string): void {
    this.findTodo(id);
    this.todos.delete(id);
    this.logger.log(`Todo ${id} deleted`);
  }

  /**
   * Remove every listed todo that exists; unknown ids are ignored
   */
  deleteTodos(ids: string[]): number {
    let deleted = 0;
    for (const id of ids) {
      if (this.todos.delete(id)) {
        deleted++;
      }
    }
    this.logger.log(`Deleted ${deleted} of ${ids.length} todos`);
    return deleted;
  }

  private findTodo(id: string): Todo {
    const todo = this.todos.get(id);
    if (!todo) {
      throw new NotFoundException(`Todo ${id} not found`);
    }
    return todo;
  }
}
