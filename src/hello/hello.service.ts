import { Injectable } from '@nestjs/common';

export interface HelloResponseDto {
  result: string;
}

@Injectable()
export class HelloService {
  hello(name: string): HelloResponseDto {
    return { result: `Hello, ${name}!` };
  }
}
