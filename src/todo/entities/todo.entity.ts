export class Todo {
  id: string;
  text: string;
  is_finished: boolean;

  constructor(id: string, text: string, isFinished = false) {
    this.id = id;
    this.text = text;
    this.is_finished = isFinished;
  }
}
