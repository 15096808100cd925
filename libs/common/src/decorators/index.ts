export * from './current-user.decorator';
export * from './public.decorator';
export * from './roles.decorator';
