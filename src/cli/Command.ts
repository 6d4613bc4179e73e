export enum Command {
    Add = 'add',
    List = 'list',
    Search = 'search',
    Delete = 'delete',
    Clear = 'clear',
}

export const USAGE = [
    'An expense recording system',
    '',
    'Commands:',
    '',
    'add AMOUNT MEMO [DATE] - record a new expense',
    'clear - delete all expenses',
    'list - list all expenses',
    'delete NUMBER - remove expense with id NUMBER',
    'search QUERY - list expenses with a matching memo field',
];
