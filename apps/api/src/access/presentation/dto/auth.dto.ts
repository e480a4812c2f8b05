import { IsEmail, IsString, Matches, MaxLength, MinLength } from 'class-validator';

const USERNAME_REGEX = /^[A-Za-z0-9_.-]{1,64}$/;

export class RegisterDto {
  @IsEmail()
  @MaxLength(320)
  email!: string;

  @IsString()
  @Matches(USERNAME_REGEX, {
    message: 'username must be 1-64 letters, digits, dots, dashes or underscores',
  })
  username!: string;

  @IsString()
  @MinLength(8)
  @MaxLength(1024)
  password!: string;
}

export class LoginDto {
  @IsString()
  @MinLength(1)
  @MaxLength(64)
  username!: string;

  @IsString()
  @MinLength(1)
  @MaxLength(1024)
  password!: string;
}
