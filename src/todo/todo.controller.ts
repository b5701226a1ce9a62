import {
  Controller,
  Post,
  Put,
  Body,
  HttpCode,
  HttpStatus,
  Query,
  Get,
  Delete,
  Param,
} from '@nestjs/common';
import { TodoService } from './services/todo.service';
import { CreateTodoDto } from './dto/create-todo.dto';
import { UpdateTodoDto } from './dto/update-todo.dto';
import { DeleteTodosDto, QueryTodosDto } from './dto/query-todos.dto';

@Controller('todos')
export class TodoController {
  constructor(private readonly todoService: TodoService) {}

  @Get()
  queryTodos(@Query() query: QueryTodosDto) {
    return this.todoService.queryTodos(query);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  createTodo(@Body() createTodoDto: CreateTodoDto) {
    return this.todoService.createTodo(createTodoDto);
  }

  @Put(':id')
  updateTodo(@Param('id') id: string, @Body() updateTodoDto: UpdateTodoDto) {
    return this.todoService.updateTodo(id, updateTodoDto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  deleteTodo(@Param('id') id: string): void {
    this.todoService.deleteTodo(id);
  }

  @Delete()
  @HttpCode(HttpStatus.NO_CONTENT)
  deleteTodos(@Query() query: DeleteTodosDto): void {
    this.todoService.deleteTodos(query.ids);
  }
}
